import { TZDate } from "@date-fns/tz";
import { isValid, parse } from "date-fns";
import { CodedError, ErrorCode } from "../../errors";

/**
 * Conversion utilities shared by the extractors.
 * Cell converters accept the "no report" tokens of the scraped tables and map them to the
 * documented sentinel; any other text that is not a number raises a MalformedValue error.
 */

/** Cell texts the scraped tables use when a station did not report a value. */
export const NO_REPORT_TOKENS: ReadonlySet<string> = new Set( [ "", "-", "keine Meldung" ] );

/** Date format of the table rows after the current year was inserted. */
const TABLE_DATE_FORMAT = "dd.MM.yyyy HH:mm";

export function isNoReport( text: string ): boolean {
    return NO_REPORT_TOKENS.has( text );
}

/**
 * Parse a number the way the tables write it ("12.3", "-4", " 7.0"). Blank or non-numeric text throws.
 */
export function parseNumber( text: string ): number {
    const trimmed = text.trim();
    const value = Number( trimmed );
    if ( trimmed === "" || Number.isNaN( value ) ) {
        throw new CodedError( ErrorCode.MalformedValue, `Not a number: "${ text }"` );
    }
    return value;
}

/**
 * Convert an integer in tenths of a unit (DWD API) to the unit.
 * Values outside of the inclusive limits are replaced by the fallback.
 */
export function tenthsToUnit( raw: number, limits: readonly [ number, number ], fallback: number ): number {
    const [ lower, upper ] = limits;
    if ( raw < lower || raw > upper ) {
        return fallback;
    }
    return raw / 10;
}

/**
 * Temperature / humidity
 */

/** Dew point formulas. "ardenBuck" is usable between -80°C and +50°C, "magnus" between -45°C and +60°C. */
export type DewPointFormula = "ardenBuck" | "magnus";

/**
 * Dew point (in Celsius) by the Magnus formula with the Boegel modification (Arden Buck equation).
 */
export function calcDewPointArdenBuck( humidity: number, temperature: number ): number {
    if ( Number.isNaN( humidity ) || Number.isNaN( temperature ) ) {
        return NaN;
    }

    const k2 = 18.678;
    const k3 = 257.14;
    const k4 = 234.5;

    const f1 = k2 - ( temperature / k4 );
    const f2 = temperature / ( k3 + temperature );
    const gamma = Math.log( ( humidity / 100 ) * Math.exp( f1 * f2 ) );
    return ( k3 * gamma ) / ( k2 - gamma );
}

/**
 * Dew point (in Celsius) by the classic Magnus formula.
 */
export function calcDewPointMagnus( humidity: number, temperature: number ): number {
    if ( Number.isNaN( humidity ) || Number.isNaN( temperature ) ) {
        return NaN;
    }

    const k2 = 17.62;
    const k3 = 243.12;

    const f1 = ( k2 * temperature ) / ( k3 + temperature );
    const f2 = ( k2 * k3 ) / ( k3 + temperature );
    const lnHumidity = Math.log( humidity / 100 );
    return k3 * ( ( f1 + lnHumidity ) / ( f2 - lnHumidity ) );
}

export function calcDewPoint( formula: DewPointFormula, humidity: number, temperature: number ): number {
    return formula === "magnus"
        ? calcDewPointMagnus( humidity, temperature )
        : calcDewPointArdenBuck( humidity, temperature );
}

/**
 * Table cells
 */

/**
 * Convert a row date like "Mo 19.10. 14:00" to a date in the given time zone.
 * The rows carry no year, so the year of the reference date is inserted. Rows from December read in
 * January therefore land in the wrong year.
 * "No report" cells become midnight of 1970-01-01.
 */
export function convertDateTimeString( text: string, timezone: string, reference: Date = new Date() ): Date {
    if ( isNoReport( text ) ) {
        return new TZDate( 1970, 0, 1, 0, 0, timezone );
    }

    const parts = text.split( " " );
    if ( parts.length < 3 ) {
        throw new CodedError( ErrorCode.MalformedValue, `Not a table date: "${ text }"` );
    }

    const localReference = new TZDate( reference.getTime(), timezone );
    const dateString = `${ parts[ 1 ] }${ localReference.getFullYear() } ${ parts[ 2 ] }`;
    const date = parse( dateString, TABLE_DATE_FORMAT, localReference );
    if ( !isValid( date ) ) {
        throw new CodedError( ErrorCode.MalformedValue, `Not a table date: "${ text }"` );
    }
    return date;
}

/** "12.3°C" -> 12.3, "no report" -> NaN */
export function convertTemperatureString( text: string ): number {
    const numberString = text.split( "°" )[ 0 ];
    return isNoReport( numberString ) ? NaN : parseNumber( numberString );
}

/** "87%" -> 87, "no report" -> NaN */
export function convertHumidityString( text: string ): number {
    const numberString = text.split( "%" )[ 0 ];
    return isNoReport( numberString ) ? NaN : parseNumber( numberString );
}

/**
 * "0.4 l/m²" -> 0.4. A leading non-digit is read as a sign and dropped, so "-0.4 l/m²" is 0.4 as well.
 * "No report" cells become `noReportValue`.
 */
export function convertPrecipitationString( text: string, noReportValue: number ): number {
    if ( isNoReport( text ) ) {
        return noReportValue;
    }

    const numberString = text.split( " " )[ 0 ];
    if ( /^\d/.test( numberString ) ) {
        return parseNumber( numberString );
    }
    return parseNumber( numberString.slice( 1 ) );
}
