import { Sample } from "../../types";

/**
 * Normalized time series of the DWD API. All series are chronological, values are in Celsius and
 * millimeters. Missing temperatures are NaN, missing precipitation steps are 0.
 */
export interface DWDSeries {
    temperatures: Sample[];
    dewPoints: Sample[];
    /** Precipitation per time step (not accumulated). */
    precipitations: Sample[];
    days: DWDDay[];
}

/** One entry of the daily forecast. */
export interface DWDDay {
    /** Local midnight of the day. */
    date: Date;
    icon: number;
    /** NaN when the API sent no usable value. */
    temperatureMin: number;
    temperatureMax: number;
}

/**
 * Normalized data of a W24 station page. Series are chronological (oldest first), as the page embeds them.
 * Samples without a measurement keep their slot with a NaN value.
 */
export interface W24Series {
    temperatures: Sample[];
    dewPoints: Sample[];
    precipitation?: W24Precipitation;
}

/**
 * Newer pages embed one running total per day, older pages hourly amounts. A page has one of the two.
 */
export type W24Precipitation =
    | { kind: "daily"; totals: ( number | null )[] }
    | { kind: "hourly"; samples: Sample[] };

/**
 * Normalized tables of a WON station page, latest row first as on the page.
 */
export interface WONSeries {
    temperatures: Sample[];
    humidities: Sample[];
    precipitations: Sample[];
}
