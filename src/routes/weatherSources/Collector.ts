import { DisplayData, SourceId, Station } from "../../types";
import { CodedError, ErrorCode } from "../../errors";
import { DewPointFormula } from "../normalization/converters";
import { validateDisplayData } from "../normalization/DisplayDataValidator";
import { combineAll } from "./combine";
import { DataSource, DataSourceOptions, WeatherSource } from "./DataSource";
import { DWDExtractor } from "./extractors/DWDExtractor";
import { W24Extractor } from "./extractors/W24Extractor";
import { WONExtractor } from "./extractors/WONExtractor";
import { createFetcher, FetchOptions } from "./fetchWithRetry";

export const SOURCES: readonly SourceId[] = [ "dwd", "w24", "won" ];

/** The station used when nothing is configured. */
export const DEFAULT_STATION: Station = Object.freeze( {
    name: "Error",
    number: 0,
    type: "",
    identifier: "0",
    latitude: 0,
    longitude: 0,
    altitude: 0,
    riverBasin: "",
    state: "",
} );

export interface CollectorOptions extends Omit<DataSourceOptions, "fetcher"> {
    fetch?: FetchOptions;
    dewPointFormula?: DewPointFormula;
    /** Creates the sources; replaced in tests. */
    createSource?: ( id: SourceId, station: Station ) => WeatherSource;
}

export function isSourceId( name: string ): name is SourceId {
    return ( SOURCES as readonly string[] ).includes( name );
}

/**
 * Source name for a configuration key or CLI value ("dwd", "w24", "won" or their index).
 */
export function parseSourceId( value: string ): SourceId {
    const normalized = value.trim().toLowerCase();
    if ( isSourceId( normalized ) ) {
        return normalized;
    }
    const index = Number( normalized );
    if ( normalized !== "" && Number.isInteger( index ) && index >= 0 && index < SOURCES.length ) {
        return SOURCES[ index ];
    }
    throw new CodedError( ErrorCode.UnknownSource, `Unknown data source: "${ value }"` );
}

/**
 * Owns the configured sources of one program run, updates them together and merges their records.
 */
export class Collector {
    private readonly sources = new Map<SourceId, WeatherSource>();
    private readonly clock: () => Date;
    private isUpdated = false;

    /**
     * @param stations Station per source name, in priority order. Unknown names fall back to the DWD source.
     * Without stations one DWD source with the default station is created.
     */
    public constructor( stations: ReadonlyMap<string, Station> | undefined, options: CollectorOptions = {} ) {
        this.clock = options.clock ?? ( () => new Date() );
        const createSource = options.createSource ?? ( ( id: SourceId, station: Station ) => createDataSource( id, station, options ) );

        if ( !stations || stations.size === 0 ) {
            this.sources.set( "dwd", createSource( "dwd", DEFAULT_STATION ) );
            return;
        }

        for ( const [ name, station ] of stations ) {
            let id: SourceId = "dwd";
            if ( isSourceId( name ) ) {
                id = name;
            } else {
                console.warn( `[Collector] Unknown data source "${ name }", using dwd` );
            }
            this.sources.set( id, createSource( id, station ) );
        }
    }

    public get sourceIds(): SourceId[] {
        return Array.from( this.sources.keys() );
    }

    /**
     * Update all sources one after the other. Every source is updated even if an earlier one failed.
     * @returns true if all sources were updated.
     */
    public async update(): Promise<boolean> {
        let isUpdated = true;
        for ( const source of this.sources.values() ) {
            const success = await source.update();
            isUpdated = isUpdated && success;
        }

        this.isUpdated = isUpdated;
        return isUpdated;
    }

    /**
     * Merged record of all sources. Updates first unless `update()` succeeded since the last call.
     */
    public async getDisplayData(): Promise<DisplayData> {
        if ( !this.isUpdated ) {
            await this.update();
        }

        const records = Array.from( this.sources.values() ).map( source => source.getDisplayData() );
        const result = combineAll( records );

        const validation = validateDisplayData( result, { now: this.clock() } );
        validation.errors.forEach( error => console.warn( `[Collector] Implausible data: ${ error }` ) );
        validation.warnings.forEach( warning => console.log( `[Collector] ${ warning }` ) );

        this.isUpdated = false;
        return result;
    }
}

export function createDataSource( id: SourceId, station: Station, options: CollectorOptions = {} ): WeatherSource {
    const dataSourceOptions: DataSourceOptions = {
        fallbackTimezone: options.fallbackTimezone,
        clock: options.clock,
    };

    switch ( id ) {
        case "w24": {
            const extractor = new W24Extractor();
            return new DataSource( extractor, station, { ...dataSourceOptions, fetcher: createFetcher( options.fetch, undefined, extractor.name ) } );
        }
        case "won": {
            const extractor = new WONExtractor( { dewPointFormula: options.dewPointFormula } );
            return new DataSource( extractor, station, { ...dataSourceOptions, fetcher: createFetcher( options.fetch, undefined, extractor.name ) } );
        }
        case "dwd": {
            const extractor = new DWDExtractor();
            return new DataSource( extractor, station, { ...dataSourceOptions, fetcher: createFetcher( options.fetch, undefined, extractor.name ) } );
        }
    }
}
