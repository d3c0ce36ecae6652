import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DEFAULT_DATA_DIR, loadSettings, loadStationsConfig } from "../src/config";

describe( "loadSettings", () => {
    it( "uses the defaults for an empty environment", () => {
        expect( loadSettings( {} ) ).toEqual( {
            dataDir: DEFAULT_DATA_DIR,
            httpAttempts: 3,
            httpTimeout: 10,
            refreshMinutes: 10,
            stationsRefreshHours: 24,
            timezone: undefined,
            port: 8080,
        } );
    } );

    it( "reads the environment", () => {
        const settings = loadSettings( {
            WEATHER_DATA_DIR: "/tmp/weather",
            HTTP_ATTEMPTS: "5",
            HTTP_TIMEOUT: "2.5",
            REFRESH_MINUTES: "1",
            STATIONS_REFRESH_HOURS: "0",
            TIMEZONE: "Europe/Berlin",
            PORT: "9000",
        } );

        expect( settings ).toEqual( {
            dataDir: "/tmp/weather",
            httpAttempts: 5,
            httpTimeout: 2.5,
            refreshMinutes: 1,
            stationsRefreshHours: 0,
            timezone: "Europe/Berlin",
            port: 9000,
        } );
    } );

    it( "falls back to the default for unusable values", () => {
        const settings = loadSettings( { HTTP_ATTEMPTS: "many", PORT: "-1", REFRESH_MINUTES: "0" } );

        expect( settings.httpAttempts ).toBe( 3 );
        expect( settings.port ).toBe( 8080 );
        expect( settings.refreshMinutes ).toBe( 10 );
    } );
} );

describe( "loadStationsConfig", () => {
    let dataDir: string;

    beforeEach( () => {
        dataDir = fs.mkdtempSync( path.join( os.tmpdir(), "weather-panel-" ) );
        vi.spyOn( console, "warn" ).mockImplementation( () => undefined );
        vi.spyOn( console, "error" ).mockImplementation( () => undefined );
    } );

    afterEach( () => {
        fs.rmSync( dataDir, { recursive: true, force: true } );
        vi.restoreAllMocks();
    } );

    function writeConfig( content: string ): void {
        fs.writeFileSync( path.join( dataDir, "stations.json" ), content );
    }

    it( "keeps the order of the sources", () => {
        writeConfig( JSON.stringify( {
            won: { name: "Teststadt", id: "abc123" },
            dwd: { lat: 52.5, lon: 13.4 },
            w24: { name: "Teststadt", id: 10410, timezone: "Europe/Berlin" },
        } ) );

        const config = loadStationsConfig( dataDir );
        expect( Array.from( config.keys() ) ).toEqual( [ "won", "dwd", "w24" ] );
        expect( config.get( "w24" ) ).toEqual( { name: "Teststadt", id: "10410", timezone: "Europe/Berlin" } );
        expect( config.get( "dwd" ) ).toEqual( { lat: 52.5, lon: 13.4 } );
    } );

    it( "is empty without a file", () => {
        expect( loadStationsConfig( dataDir ).size ).toBe( 0 );
        expect( console.warn ).toHaveBeenCalledWith( `[Config] I/O Error: ${ path.join( dataDir, "stations.json" ) } does not exist` );
    } );

    it( "is empty for a file that is not JSON", () => {
        writeConfig( "dwd: Teststadt" );
        expect( loadStationsConfig( dataDir ).size ).toBe( 0 );
    } );

    it( "is empty for a file with unexpected content", () => {
        writeConfig( JSON.stringify( { dwd: { lat: "north" } } ) );
        expect( loadStationsConfig( dataDir ).size ).toBe( 0 );
    } );
} );
