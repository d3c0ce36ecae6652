/** Geographic coordinates. The 1st element is the latitude, and the 2nd element is the longitude. */
export type GeoCoordinates = [number, number];

/** The data sources a station can be read from. */
export type SourceId = "dwd" | "w24" | "won";

/** A weather station of one of the data sources. Stations are never mutated after creation. */
export interface Station {
	/** Display name of the station. Also part of the W24 and WON page urls. */
	readonly name: string;
	/** Numeric station number (DWD station id, W24 page number). */
	readonly number: number;
	/** Station type as listed in the DWD station table (e.g. "SY"). */
	readonly type: string;
	/** Source-specific identifier (DWD station code, WON "iid"). */
	readonly identifier: string;
	readonly latitude: number;
	readonly longitude: number;
	/** Altitude in meters above sea level. */
	readonly altitude: number;
	readonly riverBasin: string;
	readonly state: string;
	/** First day with data in the DWD archive. */
	readonly start?: Date;
	/** Last day with data in the DWD archive. */
	readonly end?: Date;
	/** IANA time zone override. Looked up from the coordinates if absent. */
	readonly timezone?: string;
}

/**
 * The normalized weather snapshot handed to the outputs. Every field has an "unavailable" value
 * (NaN for numbers, undefined for the timestamp, "Error" and 0 for the discrete fields), so outputs only
 * need to format.
 */
export interface DisplayData {
	/** Name of the weather station. */
	readonly stationName: string;
	/** Time of the most recent usable temperature sample, in the station's time zone. */
	readonly dateTime?: Date;
	/** The temperature (in Celsius). */
	readonly temperature: number;
	/** The dew point (in Celsius). */
	readonly dewPoint: number;
	/** The precipitation of the current day (in millimeters). */
	readonly precipitation: number;
	/** Forecast icon code of the current day (1-31). */
	readonly forecast: number;
	/** The minimum temperature of the current day (in Celsius). */
	readonly dailyMin: number;
	/** The maximum temperature of the current day (in Celsius). */
	readonly dailyMax: number;
}

/** A single value of a time series. NaN marks a sample without data. */
export interface Sample {
	time: Date;
	value: number;
}

/** Result of a plausibility check. */
export interface ValidationResult {
	/** Whether no blocking problem was found */
	valid: boolean;

	/** Problems that make the record implausible */
	errors: string[];

	/** Findings worth logging */
	warnings: string[];
}
