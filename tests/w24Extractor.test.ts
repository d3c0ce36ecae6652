import { describe, expect, it } from "vitest";
import { Station } from "../src/types";
import { DEFAULT_STATION } from "../src/routes/weatherSources/Collector";
import { W24Extractor } from "../src/routes/weatherSources/extractors/W24Extractor";

const station: Station = { ...DEFAULT_STATION, name: "Teststadt", number: 10410, timezone: "UTC" };
const context = { timezone: "UTC", now: new Date( "2026-10-19T14:00:00Z" ) };
const at = ( iso: string ) => Date.parse( iso );

function page( stationData: object, scripts = 2 ): string {
    const extra = scripts > 1 ? "<script>initCharts();</script>".repeat( scripts - 1 ) : "";
    return `<html><body><main>
        <script>var station = "x"; initWeatherStation(${ JSON.stringify( stationData ) });</script>${ extra }
    </main></body></html>`;
}

const temperatures = {
    measuredTemperature: [
        [ at( "2026-10-18T22:00:00Z" ), 8.0 ],
        [ at( "2026-10-19T00:00:00Z" ), 6.5 ],
        [ at( "2026-10-19T06:00:00Z" ), 4.0 ],
        [ at( "2026-10-19T12:00:00Z" ), 13.5 ],
        [ at( "2026-10-19T13:00:00Z" ), null ],
    ],
    dewpoints: [
        [ at( "2026-10-19T12:00:00Z" ), 7.5 ],
        [ at( "2026-10-19T13:00:00Z" ), null ],
    ],
};

describe( "W24Extractor", () => {
    const extractor = new W24Extractor();

    function displayData( html: string ) {
        const data = extractor.extract( html, station, context );
        if ( !data ) {
            throw new Error( "no data extracted" );
        }
        return extractor.toDisplayData( data, station );
    }

    it( "builds the page url from name and number", () => {
        expect( extractor.buildRequest( station ).url ).toBe( "http://www.wetter24.de/wetterstation/teststadt/10410" );
    } );

    it( "uses the latest measured temperature and the extremes since midnight", () => {
        const data = displayData( page( { temperatures, precipitation: { daily: [ 0.0, 2.4 ] } } ) );

        expect( data.stationName ).toBe( "Teststadt" );
        expect( data.dateTime?.getTime() ).toBe( at( "2026-10-19T12:00:00Z" ) );
        expect( data.temperature ).toBe( 13.5 );
        expect( data.dailyMin ).toBe( 4 );
        expect( data.dailyMax ).toBe( 13.5 );
        expect( data.dewPoint ).toBe( 7.5 );
        expect( data.precipitation ).toBe( 2.4 );
        expect( data.forecast ).toBe( 0 );
    } );

    it( "treats a missing daily total as dry", () => {
        const data = displayData( page( { temperatures, precipitation: { daily: [ 1.0, null ] } } ) );
        expect( data.precipitation ).toBe( 0 );
    } );

    it( "falls back to the latest hourly amount", () => {
        const hourly = [ [ at( "2026-10-19T11:00:00Z" ), 0.2 ], [ at( "2026-10-19T12:00:00Z" ), null ] ];
        const data = displayData( page( { temperatures, precipitation: { hourly } } ) );
        expect( data.precipitation ).toBe( 0.2 );
    } );

    it( "leaves precipitation unset when the page has none", () => {
        const data = displayData( page( { temperatures } ) );
        expect( data.precipitation ).toBeNaN();
    } );

    it( "extracts nothing from an unexpected page layout", () => {
        expect( extractor.extract( page( { temperatures }, 1 ), station, context ) ).toBeUndefined();
        expect( extractor.extract( page( { temperatures }, 3 ), station, context ) ).toBeUndefined();
        expect( extractor.extract( "<html><body><main><script>a()</script><script>b()</script></main></body></html>", station, context ) ).toBeUndefined();
        expect( extractor.extract( page( { temperatures: { measuredTemperature: "none" } } ), station, context ) ).toBeUndefined();
        expect( extractor.extract( page( {} ), station, context ) ).toBeUndefined();
    } );
} );
