import { Server } from "http";
import axios from "axios";
import { afterEach, describe, expect, it, vi } from "vitest";
import { DisplayData } from "../src/types";
import { createDisplayData } from "../src/routes/normalization/displayData";
import { DEFAULT_STATION } from "../src/routes/weatherSources/Collector";
import { createApp, getTZ, serveDisplayData, toWeatherResponse } from "../src/routes/weather";

const data = createDisplayData( {
    stationName: "Teststadt",
    dateTime: new Date( "2026-10-19T14:00:00Z" ),
    temperature: 12.5,
    dewPoint: NaN,
    precipitation: 0,
    forecast: 8,
    dailyMin: 4,
    dailyMax: 13,
} );

describe( "getTZ", () => {
    it( "prefers the station's own zone", () => {
        expect( getTZ( { ...DEFAULT_STATION, latitude: 52.52, longitude: 13.4, timezone: "UTC" } ) ).toBe( "UTC" );
    } );

    it( "looks the zone up from the coordinates", () => {
        expect( getTZ( { ...DEFAULT_STATION, latitude: 52.52, longitude: 13.4 } ) ).toBe( "Europe/Berlin" );
    } );

    it( "uses the fallback for stations without coordinates", () => {
        expect( getTZ( DEFAULT_STATION, "Europe/Vienna" ) ).toBe( "Europe/Vienna" );
        expect( getTZ( DEFAULT_STATION ) ).toBe( Intl.DateTimeFormat().resolvedOptions().timeZone );
    } );
} );

describe( "toWeatherResponse", () => {
    it( "formats the record and replaces unavailable numbers with null", () => {
        expect( toWeatherResponse( data ) ).toEqual( {
            stationName: "Teststadt",
            dateTime: "2026-10-19T14:00:00.000Z",
            date: "Mon., 19.10.2026",
            time: "14:00",
            temperature: 12.5,
            dewPoint: null,
            precipitation: 0,
            forecast: 8,
            forecastDescription: "rain",
            dailyMin: 4,
            dailyMax: 13,
        } );
    } );

    it( "has no timestamp for the unavailable record", () => {
        const response = toWeatherResponse( createDisplayData() );
        expect( response.dateTime ).toBeNull();
        expect( response.temperature ).toBeNull();
        expect( response.forecastDescription ).toBe( "Error" );
    } );
} );

describe( "createApp", () => {
    let server: Server | undefined;

    async function start( latest: () => DisplayData | undefined ): Promise<string> {
        const app = createApp( latest );
        const listening = await new Promise<Server>( resolve => {
            const created = app.listen( 0, "127.0.0.1", () => resolve( created ) );
        } );
        server = listening;
        const address = listening.address();
        if ( address === null || typeof address === "string" ) {
            throw new Error( "server has no port" );
        }
        return `http://127.0.0.1:${ address.port }`;
    }

    afterEach( async () => {
        const running = server;
        server = undefined;
        if ( running ) {
            await new Promise<void>( ( resolve, reject ) => running.close( err => err ? reject( err ) : resolve() ) );
        }
    } );

    it( "serves the last record as JSON", async () => {
        const base = await start( () => data );
        const response = await axios.get( `${ base }/weather` );

        expect( response.status ).toBe( 200 );
        expect( response.data ).toEqual( toWeatherResponse( data ) );
    } );

    it( "serves the console text", async () => {
        const base = await start( () => data );
        const response = await axios.get<string>( `${ base }/weather.txt`, { responseType: "text" } );

        expect( response.headers[ "content-type" ] ).toMatch( /^text\/plain/ );
        expect( response.data.split( "\n" )[ 0 ] ).toBe( "Station: Teststadt" );
    } );

    it( "answers 503 before the first update", async () => {
        const base = await start( () => undefined );
        const response = await axios.get( `${ base }/weather`, { validateStatus: () => true } );

        expect( response.status ).toBe( 503 );
        expect( response.data ).toEqual( { error: "No weather data available yet" } );
    } );
} );

describe( "serveDisplayData", () => {
    const servers: Server[] = [];

    afterEach( async () => {
        vi.restoreAllMocks();
        for ( const server of servers.splice( 0 ) ) {
            if ( server.listening ) {
                await new Promise<void>( resolve => server.close( () => resolve() ) );
            }
        }
    } );

    it( "reports a port that is already taken", async () => {
        vi.spyOn( console, "log" ).mockImplementation( () => undefined );
        const error = vi.spyOn( console, "error" ).mockImplementation( () => undefined );

        const first = await new Promise<Server>( resolve => {
            const created = serveDisplayData( () => data, 0, () => undefined );
            created.once( "listening", () => resolve( created ) );
        } );
        servers.push( first );
        const address = first.address();
        if ( address === null || typeof address === "string" ) {
            throw new Error( "server has no port" );
        }

        const failure = await new Promise<Error>( resolve => {
            servers.push( serveDisplayData( () => data, address.port, resolve ) );
        } );

        expect( failure.message ).toMatch( /EADDRINUSE/ );
        expect( error ).toHaveBeenCalledWith( `[HTTP] Connection Error: cannot serve on port ${ address.port }:`, failure.message );
    } );
} );
