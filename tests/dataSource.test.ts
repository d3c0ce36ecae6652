import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { Station } from "../src/types";
import { DataSource } from "../src/routes/weatherSources/DataSource";
import { DWDExtractor } from "../src/routes/weatherSources/extractors/DWDExtractor";
import { DEFAULT_STATION } from "../src/routes/weatherSources/Collector";
import { Fetcher } from "../src/routes/weatherSources/fetchWithRetry";
import { SourceRequest } from "../src/routes/weatherSources/SourceExtractor";

const station: Station = { ...DEFAULT_STATION, name: "Teststadt", identifier: "10637", timezone: "UTC" };
const clock = () => new Date( "1970-01-01T01:30:00Z" );

function response( temperature: number ): string {
    return JSON.stringify( {
        "10637": { forecast1: { start: 0, timeStep: 3600000, temperature: [ temperature, temperature + 10 ] } },
    } );
}

/** Serves the given bodies one per call. */
function fakeFetcher( bodies: ( string | undefined )[] ) {
    const requests: SourceRequest[] = [];
    const fetcher: Fetcher = async request => {
        requests.push( request );
        return bodies.shift();
    };
    return { fetcher, requests };
}

describe( "DataSource", () => {
    beforeEach( () => {
        vi.spyOn( console, "warn" ).mockImplementation( () => undefined );
    } );

    afterEach( () => {
        vi.restoreAllMocks();
    } );

    it( "returns the unavailable record with the station name before the first update", () => {
        const source = new DataSource( new DWDExtractor(), station, { fetcher: fakeFetcher( [] ).fetcher, clock } );
        const data = source.getDisplayData();

        expect( data.stationName ).toBe( "Teststadt" );
        expect( data.temperature ).toBeNaN();
        expect( data.dateTime ).toBeUndefined();
    } );

    it( "requests the station from its extractor", async () => {
        const { fetcher, requests } = fakeFetcher( [ response( 100 ) ] );
        const source = new DataSource( new DWDExtractor(), station, { fetcher, clock } );

        expect( await source.update() ).toBe( true );
        expect( requests ).toEqual( [ new DWDExtractor().buildRequest( station ) ] );
        expect( source.id ).toBe( "dwd" );
        expect( source.getDisplayData().temperature ).toBe( 11 );
    } );

    it( "keeps the previous data when the fetch fails", async () => {
        const { fetcher } = fakeFetcher( [ response( 100 ), undefined ] );
        const source = new DataSource( new DWDExtractor(), station, { fetcher, clock } );

        await source.update();
        expect( await source.update() ).toBe( false );
        expect( source.getDisplayData().temperature ).toBe( 11 );
    } );

    it( "keeps the previous data when the response is unusable", async () => {
        const { fetcher } = fakeFetcher( [ response( 100 ), "{}", "not json", response( 200 ) ] );
        const source = new DataSource( new DWDExtractor(), station, { fetcher, clock } );

        await source.update();
        expect( await source.update() ).toBe( false );
        expect( await source.update() ).toBe( false );
        expect( source.getDisplayData().temperature ).toBe( 11 );

        expect( await source.update() ).toBe( true );
        expect( source.getDisplayData().temperature ).toBe( 21 );
    } );
} );
