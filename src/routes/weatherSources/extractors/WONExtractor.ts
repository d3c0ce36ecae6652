import * as cheerio from "cheerio";
import { startOfDay } from "date-fns";
import { DisplayData, Sample, Station } from "../../../types";
import {
    calcDewPoint,
    convertDateTimeString,
    convertHumidityString,
    convertPrecipitationString,
    convertTemperatureString,
    DewPointFormula
} from "../../normalization/converters";
import { createDisplayData } from "../../normalization/displayData";
import { WONSeries } from "../../normalization/types";
import { BROWSER_USER_AGENT, ExtractionContext, SourceExtractor, SourceRequest } from "../SourceExtractor";

const WON_BASE_URL = "https://www.wetteronline.de/wetter-aktuell";

/** Ids of the three table containers below #showcase. */
const TABLE_IDS = [ "temperature", "humidity", "precipitation" ] as const;

export interface WONExtractorOptions {
    /** Formula used to derive the dew point from humidity and temperature. */
    dewPointFormula?: DewPointFormula;
}

/**
 * Extractor for the "wetter aktuell" pages of wetteronline.de.
 *
 * The page shows three hourly tables (temperature, humidity, precipitation) with the latest row first. The
 * page has no dew point, it is calculated from the latest humidity and temperature.
 */
export class WONExtractor implements SourceExtractor<WONSeries> {
    readonly id = "won";
    readonly name = "WON";

    private readonly dewPointFormula: DewPointFormula;

    constructor( options: WONExtractorOptions = {} ) {
        this.dewPointFormula = options.dewPointFormula ?? "magnus";
    }

    buildRequest( station: Station ): SourceRequest {
        return {
            url: `${ WON_BASE_URL }/${ station.name.toLowerCase() }`,
            params: { iid: station.identifier },
            headers: { "User-Agent": BROWSER_USER_AGENT },
        };
    }

    extract( body: string, station: Station, context: ExtractionContext ): WONSeries | undefined {
        const $ = cheerio.load( body );
        const showcase = $( "div#showcase" ).first();
        if ( showcase.length === 0 ) {
            console.warn( `[${ this.name }] Data Error: no #showcase on the page of ${ station.name }` );
            return undefined;
        }

        const tables: string[][][] = [];
        for ( const id of TABLE_IDS ) {
            const container = showcase.children( `div#${ id }` );
            if ( container.length === 0 ) {
                console.warn( `[${ this.name }] Data Error: no ${ id } table on the page of ${ station.name }` );
                return undefined;
            }

            const rows = container.children( "table.hourly" ).children( "tbody" ).children( "tr" );
            const cells = rows.toArray()
                .map( row => $( row ).children( "td" ).toArray().map( cell => $( cell ).text() ) )
                .filter( row => row.length >= 2 );
            tables.push( cells );
        }

        const [ temperatureRows, humidityRows, precipitationRows ] = tables;
        const toSamples = ( rows: string[][], convertValue: ( text: string ) => number ): Sample[] =>
            rows.map( ( [ dateTime, value ] ) => ( {
                time: convertDateTimeString( dateTime, context.timezone, context.now ),
                value: convertValue( value ),
            } ) );

        const series: WONSeries = {
            temperatures: toSamples( temperatureRows, convertTemperatureString ),
            humidities: toSamples( humidityRows, convertHumidityString ),
            // Unreported hours count as dry, the amounts are summed.
            precipitations: toSamples( precipitationRows, text => convertPrecipitationString( text, 0 ) ),
        };

        const isEmpty = series.temperatures.length === 0
            && series.humidities.length === 0
            && series.precipitations.length === 0;
        return isEmpty ? undefined : series;
    }

    toDisplayData( data: WONSeries, station: Station ): DisplayData {
        let fields: Partial<DisplayData> = { stationName: station.name };

        if ( data.temperatures.length > 0 ) {
            const current = data.temperatures[ 0 ];
            const [ dailyMin, dailyMax ] = dailyExtremes( data.temperatures, startOfDay( current.time ) );
            fields = {
                ...fields,
                dateTime: current.time,
                temperature: current.value,
                dailyMin,
                dailyMax,
            };
        }

        if ( data.humidities.length > 0 ) {
            fields = {
                ...fields,
                dewPoint: calcDewPoint( this.dewPointFormula, data.humidities[ 0 ].value, fields.temperature ?? NaN ),
            };
        }

        if ( data.precipitations.length > 0 ) {
            // The table repeats readings within an hour; only the reading at the full hour is counted.
            fields = {
                ...fields,
                precipitation: data.precipitations
                    .filter( sample => sample.time.getMinutes() === 0 )
                    .reduce( ( sum, sample ) => sum + sample.value, 0 ),
            };
        }

        return createDisplayData( fields );
    }
}

/**
 * Minimum and maximum of the rows from the start of the list (latest first) until the first row before
 * midnight. Rows without a value are skipped. NaN when no row qualifies.
 */
export function dailyExtremes( samples: readonly Sample[], midnight: Date ): [ number, number ] {
    let dailyMin = Infinity;
    let dailyMax = -Infinity;

    for ( const sample of samples ) {
        if ( sample.time.getTime() < midnight.getTime() ) {
            break;
        }
        if ( sample.value < dailyMin ) {
            dailyMin = sample.value;
        }
        if ( sample.value > dailyMax ) {
            dailyMax = sample.value;
        }
    }

    return [
        dailyMin === Infinity ? NaN : dailyMin,
        dailyMax === -Infinity ? NaN : dailyMax,
    ];
}
