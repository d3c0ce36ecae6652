import { format } from "date-fns";
import { DisplayData } from "../../types";

/** Forecast icon codes of the DWD API and their descriptions. */
export const FORECAST_ICONS: ReadonlyMap<number, string> = new Map( [
    [ 1, "sun" ],
    [ 2, "sun, slightly cloudy" ],
    [ 3, "sun, cloudy" ],
    [ 4, "clouds" ],
    [ 5, "fog" ],
    [ 6, "fog, risk of slipping" ],
    [ 7, "light rain" ],
    [ 8, "rain" ],
    [ 9, "heavy rain" ],
    [ 10, "light rain, risk of slipping" ],
    [ 11, "heavy rain, risk of slipping" ],
    [ 12, "rain, sporadic snowfall" ],
    [ 13, "rain, increased snowfall" ],
    [ 14, "light snowfall" ],
    [ 15, "snowfall" ],
    [ 16, "heavy snowfall" ],
    [ 17, "clouds, hail" ],
    [ 18, "sun, light rain" ],
    [ 19, "sun, heavy rain" ],
    [ 20, "sun, rain, sporadic snowfall" ],
    [ 21, "sun, rain, increased snowfall" ],
    [ 22, "sun, sporadic snowfall" ],
    [ 23, "sun, increased snowfall" ],
    [ 24, "sun, hail" ],
    [ 25, "sun, heavy hail" ],
    [ 26, "thunderstorm" ],
    [ 27, "thunderstorm, rain" ],
    [ 28, "thunderstorm, heavy rain" ],
    [ 29, "thunderstorm, hail" ],
    [ 30, "thunderstorm, heavy hail" ],
    [ 31, "wind" ],
] );

export const DATE_FORMAT = { pattern: "EEE., dd.MM.yyyy", fallback: "Thu., 01.01.1970" } as const;
export const TIME_FORMAT = { pattern: "HH:mm", fallback: "00:00" } as const;
export const UNKNOWN_FORECAST = "Error";

/** The record every source starts from and the combiner compares against. */
export const DEFAULT_DISPLAY_DATA: DisplayData = Object.freeze( {
    stationName: "Error",
    dateTime: undefined,
    temperature: NaN,
    dewPoint: NaN,
    precipitation: NaN,
    forecast: 0,
    dailyMin: NaN,
    dailyMax: NaN,
} );

export function createDisplayData( fields: Partial<DisplayData> = {} ): DisplayData {
    return { ...DEFAULT_DISPLAY_DATA, ...fields };
}

/**
 * Date of the record, e.g. "Mon., 19.10.2026". The date is printed in the zone it was created in.
 */
export function formatDate( data: DisplayData ): string {
    return data.dateTime ? format( data.dateTime, DATE_FORMAT.pattern ) : DATE_FORMAT.fallback;
}

export function formatTime( data: DisplayData ): string {
    return data.dateTime ? format( data.dateTime, TIME_FORMAT.pattern ) : TIME_FORMAT.fallback;
}

export function formatForecast( data: DisplayData ): string {
    return FORECAST_ICONS.get( data.forecast ) ?? UNKNOWN_FORECAST;
}
