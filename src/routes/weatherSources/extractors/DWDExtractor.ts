import { TZDate } from "@date-fns/tz";
import { isValid, parse } from "date-fns";
import { z } from "zod";
import { DisplayData, Sample, Station } from "../../../types";
import { CodedError, ErrorCode } from "../../../errors";
import { tenthsToUnit } from "../../normalization/converters";
import { createDisplayData } from "../../normalization/displayData";
import { DWDDay, DWDSeries } from "../../normalization/types";
import { ExtractionContext, SourceExtractor, SourceRequest } from "../SourceExtractor";

const DWD_API_URL = "https://app-prod-ws.warnwetter.de/v30/stationOverviewExtended";

/** Valid raw range of temperatures and dew points (tenths of a degree). */
const TEMPERATURE_LIMITS = [ -999, 999 ] as const;
/** Valid raw range of precipitation steps (tenths of a millimeter). */
const PRECIPITATION_LIMITS = [ 0, 999 ] as const;

// The API pads missing values with out of range numbers; null is treated the same way, as are
// day fields that are left out.
const rawValues = z.array( z.number().nullable() ).default( [] );

const forecastSchema = z.object( {
    start: z.number(),
    timeStep: z.number(),
    temperature: rawValues,
    dewPoint2m: rawValues,
    precipitationTotal: rawValues,
} );

const daySchema = z.object( {
    dayDate: z.string(),
    icon: z.number().nullish(),
    temperatureMin: z.number().nullish(),
    temperatureMax: z.number().nullish(),
} );

const stationOverviewSchema = z.record( z.string(), z.object( {
    forecast1: forecastSchema.optional(),
    days: z.array( daySchema ).optional(),
} ) );

export type DWDStationOverview = z.infer<typeof stationOverviewSchema>;

/**
 * Extractor for the JSON API of the Deutscher Wetterdienst (station overview).
 *
 * The API returns an hourly forecast ("forecast1") that starts at local midnight and a daily forecast
 * ("days"). All values are integers in tenths of their unit. The current values are the forecast step
 * closest to now that is not in the future.
 */
export class DWDExtractor implements SourceExtractor<DWDSeries> {
    readonly id = "dwd";
    readonly name = "DWD";

    buildRequest( station: Station ): SourceRequest {
        return {
            url: DWD_API_URL,
            params: { stationIds: station.identifier },
            headers: { accept: "application/json" },
        };
    }

    extract( body: string, station: Station, context: ExtractionContext ): DWDSeries | undefined {
        let json: unknown;
        try {
            json = JSON.parse( body );
        } catch ( err ) {
            console.warn( `[${ this.name }] Data Error: response is not JSON:`, err instanceof Error ? err.message : err );
            return undefined;
        }

        const parsed = stationOverviewSchema.safeParse( json );
        if ( !parsed.success ) {
            console.warn( `[${ this.name }] Data Error: unexpected response shape: ${ parsed.error.issues[ 0 ]?.message }` );
            return undefined;
        }

        const overview = parsed.data[ station.identifier ];
        if ( !overview ) {
            console.warn( `[${ this.name }] Data Error: no data for station ${ station.identifier }` );
            return undefined;
        }

        const series = normalizeStationOverview( overview, context.timezone );
        const isEmpty = series.temperatures.length === 0 && series.days.length === 0;
        return isEmpty ? undefined : series;
    }

    toDisplayData( data: DWDSeries, station: Station, context: ExtractionContext ): DisplayData {
        const { now } = context;
        let fields: Partial<DisplayData> = { stationName: station.name };

        const current = findLatestNotAfter( data.temperatures, sample => sample.time, now );
        if ( current ) {
            const currentTime = current.time.getTime();
            fields = {
                ...fields,
                dateTime: current.time,
                temperature: current.value,
                dewPoint: data.dewPoints.find( sample => sample.time.getTime() === currentTime )?.value ?? NaN,
                // The steps hold the amount per hour, their sum up to now is the amount of the day.
                precipitation: data.precipitations
                    .filter( sample => sample.time.getTime() <= currentTime )
                    .reduce( ( sum, sample ) => sum + sample.value, 0 ),
            };
        }

        const today = findLatestNotAfter( data.days, day => day.date, now );
        if ( today ) {
            fields = {
                ...fields,
                forecast: today.icon,
                dailyMin: today.temperatureMin,
                dailyMax: today.temperatureMax,
            };
        }

        return createDisplayData( fields );
    }
}

/**
 * Convert the raw station overview to chronological series.
 */
export function normalizeStationOverview( overview: DWDStationOverview[ string ], timezone: string ): DWDSeries {
    const series: DWDSeries = { temperatures: [], dewPoints: [], precipitations: [], days: [] };

    const forecast = overview.forecast1;
    if ( forecast ) {
        const toSamples = ( values: ( number | null )[], limits: readonly [ number, number ], fallback: number ): Sample[] =>
            values.map( ( raw, step ) => ( {
                time: new TZDate( forecast.start + step * forecast.timeStep, timezone ),
                value: raw === null ? fallback : tenthsToUnit( raw, limits, fallback ),
            } ) );

        series.temperatures = toSamples( forecast.temperature, TEMPERATURE_LIMITS, NaN );
        series.dewPoints = toSamples( forecast.dewPoint2m, TEMPERATURE_LIMITS, NaN );
        series.precipitations = toSamples( forecast.precipitationTotal, PRECIPITATION_LIMITS, 0 );
    }

    series.days = ( overview.days ?? [] ).map( ( day ): DWDDay => ( {
        date: parseDayDate( day.dayDate, timezone ),
        icon: day.icon ?? 0,
        temperatureMin: day.temperatureMin == null ? NaN : tenthsToUnit( day.temperatureMin, TEMPERATURE_LIMITS, NaN ),
        temperatureMax: day.temperatureMax == null ? NaN : tenthsToUnit( day.temperatureMax, TEMPERATURE_LIMITS, NaN ),
    } ) );

    return series;
}

/** "2026-10-19" -> local midnight of that day. */
function parseDayDate( dayDate: string, timezone: string ): Date {
    const date = parse( dayDate, "yyyy-MM-dd", new TZDate( 0, timezone ) );
    if ( !isValid( date ) ) {
        throw new CodedError( ErrorCode.MalformedValue, `Not a day date: "${ dayDate }"` );
    }
    return date;
}

/**
 * Find the entry closest to `now` that is not later than `now`. A later entry is never chosen, even if it is
 * closer. On equal times the first entry wins.
 */
export function findLatestNotAfter<T>( entries: readonly T[], timeOf: ( entry: T ) => Date, now: Date ): T | undefined {
    let best: T | undefined;
    let bestDistance = Infinity;

    for ( const entry of entries ) {
        const time = timeOf( entry ).getTime();
        if ( time > now.getTime() ) {
            continue;
        }
        const distance = now.getTime() - time;
        if ( distance < bestDistance ) {
            best = entry;
            bestDistance = distance;
        }
    }

    return best;
}
