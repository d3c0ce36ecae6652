import { DisplayData, ValidationResult } from '../../types';

/** Plausible range of measured temperatures in Celsius. */
const TEMPERATURE_RANGE = [ -80, 60 ] as const;

export interface DisplayValidationOptions {
    now: Date;
    /** Records with an older timestamp get a warning (in hours). */
    maxAgeHours?: number;
}

/**
 * Plausibility check of a merged display record. Unavailable values are never an error, outputs show them
 * as such; the check only looks at values that are present.
 */
export function validateDisplayData(
    data: DisplayData,
    options: DisplayValidationOptions
): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];
    const maxAgeHours = options.maxAgeHours ?? 3;

    // 1. Zeitstempel
    if ( !data.dateTime ) {
        warnings.push( 'No timestamp for the current values' );
    } else {
        const ageHours = ( options.now.getTime() - data.dateTime.getTime() ) / 3600000;
        if ( ageHours > maxAgeHours ) {
            warnings.push( `Current values are ${ ageHours.toFixed( 1 ) } hours old` );
        }
    }

    // 2. Wertebereiche
    const temperatures: [ string, number ][] = [
        [ 'temperature', data.temperature ],
        [ 'dewPoint', data.dewPoint ],
        [ 'dailyMin', data.dailyMin ],
        [ 'dailyMax', data.dailyMax ],
    ];
    for ( const [ field, value ] of temperatures ) {
        if ( value < TEMPERATURE_RANGE[ 0 ] || value > TEMPERATURE_RANGE[ 1 ] ) {
            errors.push( `${ field } out of range: ${ value }` );
        }
    }
    if ( data.precipitation < 0 ) {
        errors.push( `precipitation negative: ${ data.precipitation }` );
    }

    // 3. Konsistenz (min <= max)
    if ( data.dailyMin > data.dailyMax ) {
        errors.push( `dailyMin > dailyMax (${ data.dailyMin } > ${ data.dailyMax })` );
    }

    if ( data.forecast === 0 ) {
        warnings.push( 'No forecast for the current day' );
    }

    return {
        valid: errors.length === 0,
        errors,
        warnings
    };
}
