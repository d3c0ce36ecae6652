import { DisplayData } from "../../types";
import { DEFAULT_DISPLAY_DATA } from "../normalization/displayData";

/**
 * Merge the record of the next source into the accumulated record.
 *
 * Fields are taken over in groups so that values of different sources are not mixed within one group:
 * - station name: when set and different from the accumulated name.
 * - current values (time, temperature, dew point, precipitation): when the next record is at least as recent.
 *   Its precipitation is only taken when it has one.
 * - day forecast (icon, daily min/max): when the next record has an icon that differs from the accumulated one.
 *
 * Returns a new record; neither argument is modified.
 */
export function combineDisplayData( accumulated: DisplayData, next: DisplayData ): DisplayData {
    let result: DisplayData = { ...accumulated };

    if ( next.stationName !== DEFAULT_DISPLAY_DATA.stationName && next.stationName !== result.stationName ) {
        result = { ...result, stationName: next.stationName };
    }

    if ( next.dateTime && ( !result.dateTime || next.dateTime.getTime() >= result.dateTime.getTime() ) ) {
        result = {
            ...result,
            dateTime: next.dateTime,
            temperature: next.temperature,
            dewPoint: next.dewPoint,
            precipitation: Number.isNaN( next.precipitation ) ? result.precipitation : next.precipitation,
        };
    }

    if ( next.forecast !== DEFAULT_DISPLAY_DATA.forecast && next.forecast !== result.forecast ) {
        result = {
            ...result,
            forecast: next.forecast,
            dailyMin: next.dailyMin,
            dailyMax: next.dailyMax,
        };
    }

    return result;
}

/**
 * Fold the records of all sources in configuration order. The first record is the starting point; without
 * records the default record is returned.
 */
export function combineAll( records: readonly DisplayData[] ): DisplayData {
    if ( records.length === 0 ) {
        return DEFAULT_DISPLAY_DATA;
    }
    return records.slice( 1 ).reduce( combineDisplayData, records[ 0 ] );
}
