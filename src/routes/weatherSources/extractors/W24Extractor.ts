import { TZDate } from "@date-fns/tz";
import * as cheerio from "cheerio";
import { startOfDay } from "date-fns";
import { z } from "zod";
import { DisplayData, Sample, Station } from "../../../types";
import { createDisplayData } from "../../normalization/displayData";
import { W24Precipitation, W24Series } from "../../normalization/types";
import { BROWSER_USER_AGENT, ExtractionContext, SourceExtractor, SourceRequest } from "../SourceExtractor";

const W24_BASE_URL = "http://www.wetter24.de/wetterstation";
const INIT_CALL = "initWeatherStation(";

const pointSchema = z.tuple( [ z.number(), z.number().nullable() ] );

const stationPageSchema = z.object( {
    temperatures: z.object( {
        measuredTemperature: z.array( pointSchema ).optional(),
        dewpoints: z.array( pointSchema ).optional(),
    } ).optional(),
    precipitation: z.object( {
        daily: z.array( z.number().nullable() ).optional(),
        hourly: z.array( pointSchema ).optional(),
    } ).optional(),
} );

export type W24StationPage = z.infer<typeof stationPageSchema>;

/**
 * Extractor for the station pages of wetter24.de.
 *
 * The page's main element holds two scripts; the first calls `initWeatherStation(...)` with all
 * measurements of the last days as JSON.
 */
export class W24Extractor implements SourceExtractor<W24Series> {
    readonly id = "w24";
    readonly name = "W24";

    buildRequest( station: Station ): SourceRequest {
        return {
            url: `${ W24_BASE_URL }/${ station.name.toLowerCase() }/${ station.number }`,
            headers: { "User-Agent": BROWSER_USER_AGENT },
        };
    }

    extract( body: string, station: Station, context: ExtractionContext ): W24Series | undefined {
        const $ = cheerio.load( body );
        const scripts = $( "main" ).first().children( "script" );

        // Any other number of scripts means the page layout changed.
        if ( scripts.length !== 2 ) {
            console.warn( `[${ this.name }] Data Error: expected 2 scripts in main, found ${ scripts.length }` );
            return undefined;
        }

        const script = scripts.first().text();
        const callIndex = script.indexOf( INIT_CALL );
        if ( callIndex < 0 ) {
            console.warn( `[${ this.name }] Data Error: no ${ INIT_CALL }...) call on the page of ${ station.name }` );
            return undefined;
        }
        const argument = script.slice( callIndex + INIT_CALL.length ).split( ")" )[ 0 ];

        let json: unknown;
        try {
            json = JSON.parse( argument );
        } catch ( err ) {
            console.warn( `[${ this.name }] Data Error: station data is not JSON:`, err instanceof Error ? err.message : err );
            return undefined;
        }

        const parsed = stationPageSchema.safeParse( json );
        if ( !parsed.success ) {
            console.warn( `[${ this.name }] Data Error: unexpected station data shape: ${ parsed.error.issues[ 0 ]?.message }` );
            return undefined;
        }

        const series = normalizeStationPage( parsed.data, context.timezone );
        const isEmpty = series.temperatures.length === 0
            && series.dewPoints.length === 0
            && series.precipitation === undefined;
        return isEmpty ? undefined : series;
    }

    toDisplayData( data: W24Series, station: Station ): DisplayData {
        let fields: Partial<DisplayData> = { stationName: station.name };

        const latestIndex = findLastIndexWithValue( data.temperatures );
        if ( latestIndex >= 0 ) {
            const current = data.temperatures[ latestIndex ];
            const midnight = startOfDay( current.time );

            let dailyMin = Infinity;
            let dailyMax = -Infinity;
            for ( let i = latestIndex; i >= 0; i-- ) {
                const sample = data.temperatures[ i ];
                if ( Number.isNaN( sample.value ) ) {
                    continue;
                }
                if ( sample.time.getTime() < midnight.getTime() ) {
                    break;
                }
                dailyMin = Math.min( dailyMin, sample.value );
                dailyMax = Math.max( dailyMax, sample.value );
            }

            fields = {
                ...fields,
                dateTime: current.time,
                temperature: current.value,
                dailyMin: Number.isFinite( dailyMin ) ? dailyMin : NaN,
                dailyMax: Number.isFinite( dailyMax ) ? dailyMax : NaN,
            };
        }

        const dewPointIndex = findLastIndexWithValue( data.dewPoints );
        if ( dewPointIndex >= 0 ) {
            fields = { ...fields, dewPoint: data.dewPoints[ dewPointIndex ].value };
        }

        if ( data.precipitation ) {
            fields = { ...fields, precipitation: currentPrecipitation( data.precipitation ) };
        }

        return createDisplayData( fields );
    }
}

export function normalizeStationPage( page: W24StationPage, timezone: string ): W24Series {
    const toSamples = ( points: [ number, number | null ][] = [] ): Sample[] =>
        points.map( ( [ time, value ] ) => ( { time: new TZDate( time, timezone ), value: value ?? NaN } ) );

    const series: W24Series = {
        temperatures: toSamples( page.temperatures?.measuredTemperature ),
        dewPoints: toSamples( page.temperatures?.dewpoints ),
    };

    const precipitation = page.precipitation;
    if ( precipitation?.daily?.length ) {
        series.precipitation = { kind: "daily", totals: precipitation.daily };
    } else if ( precipitation?.hourly?.length ) {
        series.precipitation = { kind: "hourly", samples: toSamples( precipitation.hourly ) };
    } else if ( precipitation && ( precipitation.daily || precipitation.hourly ) ) {
        series.precipitation = { kind: "daily", totals: [] };
    }

    return series;
}

/**
 * The last entry of `daily` is today's running total; older pages only have hourly amounts, of which the
 * latest reported one is used.
 */
function currentPrecipitation( precipitation: W24Precipitation ): number {
    if ( precipitation.kind === "daily" ) {
        return precipitation.totals.length > 0 ? precipitation.totals[ precipitation.totals.length - 1 ] ?? 0 : 0;
    }
    const index = findLastIndexWithValue( precipitation.samples );
    return index >= 0 ? precipitation.samples[ index ].value : 0;
}

function findLastIndexWithValue( samples: readonly Sample[] ): number {
    for ( let i = samples.length - 1; i >= 0; i-- ) {
        if ( !Number.isNaN( samples[ i ].value ) ) {
            return i;
        }
    }
    return -1;
}
