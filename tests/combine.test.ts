import { describe, expect, it } from "vitest";
import { combineAll, combineDisplayData } from "../src/routes/weatherSources/combine";
import { createDisplayData, DEFAULT_DISPLAY_DATA } from "../src/routes/normalization/displayData";

const older = createDisplayData( {
    stationName: "Station A",
    dateTime: new Date( "2026-10-19T12:00:00Z" ),
    temperature: 10,
    dewPoint: 5,
    precipitation: 0.5,
    forecast: 4,
    dailyMin: 2,
    dailyMax: 12,
} );

const newer = createDisplayData( {
    stationName: "Station B",
    dateTime: new Date( "2026-10-19T13:00:00Z" ),
    temperature: 11,
    dewPoint: 6,
    precipitation: 0.7,
} );

describe( "combineDisplayData", () => {
    it( "takes the current values of the more recent record as a group", () => {
        const result = combineDisplayData( older, newer );

        expect( result.dateTime ).toBe( newer.dateTime );
        expect( result.temperature ).toBe( 11 );
        expect( result.dewPoint ).toBe( 6 );
        expect( result.precipitation ).toBe( 0.7 );
    } );

    it( "keeps the forecast group when the next record has none", () => {
        const result = combineDisplayData( older, newer );

        expect( result.forecast ).toBe( 4 );
        expect( result.dailyMin ).toBe( 2 );
        expect( result.dailyMax ).toBe( 12 );
    } );

    it( "ignores the current values of an older record", () => {
        const result = combineDisplayData( newer, older );

        expect( result.dateTime ).toBe( newer.dateTime );
        expect( result.temperature ).toBe( 11 );
        expect( result.dewPoint ).toBe( 6 );
        expect( result.precipitation ).toBe( 0.7 );
        expect( result.forecast ).toBe( 4 );
        expect( result.dailyMax ).toBe( 12 );
    } );

    it( "takes the later station name", () => {
        expect( combineDisplayData( older, newer ).stationName ).toBe( "Station B" );
        expect( combineDisplayData( older, createDisplayData() ).stationName ).toBe( "Station A" );
    } );

    it( "keeps the precipitation when the recent record has none", () => {
        const result = combineDisplayData( older, { ...newer, precipitation: NaN } );

        expect( result.temperature ).toBe( 11 );
        expect( result.precipitation ).toBe( 0.5 );
    } );

    it( "takes the current values when the accumulator has no timestamp", () => {
        const result = combineDisplayData( createDisplayData( { forecast: 3 } ), newer );

        expect( result.temperature ).toBe( 11 );
        expect( result.forecast ).toBe( 3 );
    } );

    it( "takes a different forecast with its extremes", () => {
        const forecast = createDisplayData( { forecast: 8, dailyMin: NaN, dailyMax: 9 } );
        const result = combineDisplayData( older, forecast );

        expect( result.forecast ).toBe( 8 );
        expect( result.dailyMin ).toBeNaN();
        expect( result.dailyMax ).toBe( 9 );
        expect( result.temperature ).toBe( 10 );
    } );

    it( "does not modify its arguments", () => {
        const copy = { ...older };
        combineDisplayData( older, newer );
        expect( older ).toEqual( copy );
    } );
} );

describe( "combineAll", () => {
    it( "returns the default record without sources", () => {
        expect( combineAll( [] ) ).toBe( DEFAULT_DISPLAY_DATA );
    } );

    it( "returns a single record unchanged", () => {
        expect( combineAll( [ older ] ) ).toBe( older );
    } );

    it( "folds in configuration order", () => {
        const forecast = createDisplayData( { stationName: "Station C", forecast: 8, dailyMin: 1, dailyMax: 9 } );
        const result = combineAll( [ older, newer, forecast ] );

        expect( result ).toEqual( {
            stationName: "Station C",
            dateTime: newer.dateTime,
            temperature: 11,
            dewPoint: 6,
            precipitation: 0.7,
            forecast: 8,
            dailyMin: 1,
            dailyMax: 9,
        } );
    } );
} );
