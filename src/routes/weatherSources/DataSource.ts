import { DisplayData, SourceId, Station } from "../../types";
import { createDisplayData } from "../normalization/displayData";
import { getTZ } from "../weather";
import { createFetcher, Fetcher } from "./fetchWithRetry";
import { ExtractionContext, SourceExtractor } from "./SourceExtractor";

/** A configured source of one station, as seen by the collector. */
export interface WeatherSource {
    readonly id: SourceId;
    readonly station: Station;

    /**
     * Fetch and extract new data. Resolves with false if nothing usable arrived, in which case the previous
     * data is kept.
     */
    update(): Promise<boolean>;

    /** The display record of the last successful update (all sentinels before the first one). */
    getDisplayData(): DisplayData;
}

export interface DataSourceOptions {
    fetcher?: Fetcher;
    /** Time zone used when the station has neither an explicit zone nor coordinates. */
    fallbackTimezone?: string;
    /** Clock used for "now"; replaced in tests. */
    clock?: () => Date;
}

/**
 * Binds an extractor to a station and keeps the normalized data of the last successful update.
 */
export class DataSource<T> implements WeatherSource {
    readonly id: SourceId;
    readonly station: Station;

    private readonly extractor: SourceExtractor<T>;
    private readonly fetcher: Fetcher;
    private readonly timezone: string;
    private readonly clock: () => Date;
    private stationData: T | undefined;

    public constructor( extractor: SourceExtractor<T>, station: Station, options: DataSourceOptions = {} ) {
        this.id = extractor.id;
        this.extractor = extractor;
        this.station = station;
        this.fetcher = options.fetcher ?? createFetcher( undefined, undefined, extractor.name );
        this.timezone = getTZ( station, options.fallbackTimezone );
        this.clock = options.clock ?? ( () => new Date() );
    }

    public async update(): Promise<boolean> {
        const body = await this.fetcher( this.extractor.buildRequest( this.station ) );
        if ( body === undefined ) {
            console.warn( `[${ this.extractor.name }] No response for station ${ this.station.name }, keeping previous data` );
            return false;
        }

        const stationData = this.extractor.extract( body, this.station, this.context() );
        if ( stationData === undefined ) {
            console.warn( `[${ this.extractor.name }] No usable data for station ${ this.station.name }, keeping previous data` );
            return false;
        }

        this.stationData = stationData;
        return true;
    }

    public getDisplayData(): DisplayData {
        if ( this.stationData === undefined ) {
            return createDisplayData( { stationName: this.station.name } );
        }
        return this.extractor.toDisplayData( this.stationData, this.station, this.context() );
    }

    private context(): ExtractionContext {
        return { timezone: this.timezone, now: this.clock() };
    }
}
