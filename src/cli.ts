import fs from "fs";
import path from "path";
import { parseArgs } from "node:util";

import { SourceId, Station } from "./types";
import { CodedError, ErrorCode } from "./errors";
import { DEFAULT_DATA_DIR, ensureDataDir, loadStationsConfig, Settings, StationOptions } from "./config";
import { Collector, DEFAULT_STATION, parseSourceId } from "./routes/weatherSources/Collector";
import { createFetcher } from "./routes/weatherSources/fetchWithRetry";
import { StationDirectory } from "./routes/stations/StationDirectory";

export const VERSION = "1.0.0";

export const USAGE = `Usage: weather-panel [-n name] [-i id] [-x lat] [-y lon] [-s src] [-d dir] [-o out] [-v]

Retrieves weather data of a station and shows it on the console.

  -n, --name     name of the weather station
  -i, --id       identifier of the weather station
  -x, --lat      geographic coordinate latitude
  -y, --lon      geographic coordinate longitude
  -s, --src      data source: 0|dwd, 1|w24, 2|won (default 0)
  -d, --dir      config and data directory with stations.json
  -o, --out      output channel: 0 console once, 1 console loop, 2 console loop and HTTP (default 0)
  -v, --version  print the version
  -h, --help     print this help`;

export interface CliArgs extends StationOptions {
	name: string;
	src: string;
	dir?: string;
	out: number;
	version: boolean;
	help: boolean;
}

function toCoordinate( flag: string, value: string | undefined ): number | undefined {
	if ( value === undefined ) {
		return undefined;
	}
	const coordinate = Number( value );
	if ( value.trim() === "" || Number.isNaN( coordinate ) ) {
		throw new CodedError( ErrorCode.InvalidConfiguration, `${ flag } expects a number, got "${ value }"` );
	}
	return coordinate;
}

export function parseCliArgs( argv: string[] ): CliArgs {
	const { values } = parseArgs( {
		args: argv,
		options: {
			name: { type: "string", short: "n", default: DEFAULT_STATION.name },
			id: { type: "string", short: "i" },
			lat: { type: "string", short: "x" },
			lon: { type: "string", short: "y" },
			src: { type: "string", short: "s", default: "0" },
			dir: { type: "string", short: "d" },
			out: { type: "string", short: "o", default: "0" },
			version: { type: "boolean", short: "v", default: false },
			help: { type: "boolean", short: "h", default: false },
		},
		strict: true,
		allowPositionals: false,
	} );

	const outValue = values.out ?? "0";
	const out = Number( outValue );
	if ( !Number.isInteger( out ) || out < 0 || out > 2 ) {
		throw new CodedError( ErrorCode.InvalidConfiguration, `--out expects 0, 1 or 2, got "${ outValue }"` );
	}

	return {
		name: values.name ?? DEFAULT_STATION.name,
		id: values.id,
		lat: toCoordinate( "--lat", values.lat ),
		lon: toCoordinate( "--lon", values.lon ),
		src: values.src ?? "0",
		dir: values.dir,
		out,
		version: values.version ?? false,
		help: values.help ?? false,
	};
}

/** Unknown source names are served by the DWD source. */
export function toSourceId( value: string ): SourceId {
	try {
		return parseSourceId( value );
	} catch ( err ) {
		if ( err instanceof CodedError && err.errCode === ErrorCode.UnknownSource ) {
			console.warn( `[CLI] ${ err.message }, using dwd` );
			return "dwd";
		}
		throw err;
	}
}

/**
 * The data directory given with -d, or the default one if it is not an existing directory.
 */
export function resolveDataDir( dir: string | undefined ): string {
	if ( dir !== undefined ) {
		const resolved = path.resolve( dir );
		if ( fs.existsSync( resolved ) && fs.statSync( resolved ).isDirectory() ) {
			return resolved;
		}
		console.warn( `[CLI] I/O Error: ${ resolved } is not a directory, using ${ DEFAULT_DATA_DIR }` );
	}
	return ensureDataDir( DEFAULT_DATA_DIR );
}

export type DirectoryFactory = ( dataDir: string ) => StationDirectory;

export class StationFactory {
	private readonly createDirectory: DirectoryFactory;
	private readonly directories = new Map<string, Promise<StationDirectory>>();

	public constructor( settings: Settings, createDirectory?: DirectoryFactory ) {
		this.createDirectory = createDirectory ?? ( dataDir => new StationDirectory( {
			dataDir,
			refreshHours: settings.stationsRefreshHours,
			fetcher: createFetcher( { attempts: settings.httpAttempts, timeout: settings.httpTimeout }, undefined, "StationDirectory" ),
		} ) );
	}

	/**
	 * Station for one source. DWD stations are looked up in the station directory, by coordinates when both
	 * are given, else by name; a station that cannot be found keeps only its name.
	 */
	public async createStation( source: SourceId, options: StationOptions, dataDir: string ): Promise<Station> {
		const name = options.name ?? DEFAULT_STATION.name;
		const located: Partial<Station> = options.lat !== undefined && options.lon !== undefined
			? { latitude: options.lat, longitude: options.lon }
			: {};

		switch ( source ) {
			case "w24": {
				const number = Number.parseInt( options.id ?? "", 10 );
				return { ...DEFAULT_STATION, ...located, name, number: Number.isNaN( number ) ? 0 : number, timezone: options.timezone };
			}
			case "won":
				return { ...DEFAULT_STATION, ...located, name, identifier: options.id ?? DEFAULT_STATION.identifier, timezone: options.timezone };
			case "dwd": {
				const directory = await this.directory( dataDir );
				try {
					const station = options.lat !== undefined && options.lon !== undefined
						? directory.getStationByDistance( options.lat, options.lon )
						: directory.getStationByName( name );
					return { ...station, timezone: options.timezone };
				} catch ( err ) {
					if ( err instanceof CodedError && err.errCode === ErrorCode.StationNotFound ) {
						console.warn( `[CLI] ${ err.message }` );
						return { ...DEFAULT_STATION, ...located, name, timezone: options.timezone };
					}
					throw err;
				}
			}
		}
	}

	/** The station directory is loaded at most once per data directory. */
	private directory( dataDir: string ): Promise<StationDirectory> {
		let directory = this.directories.get( dataDir );
		if ( !directory ) {
			const created = this.createDirectory( dataDir );
			directory = created.update().then( () => created );
			this.directories.set( dataDir, directory );
		}
		return directory;
	}
}

/**
 * Build the collector from stations.json when -d is given, else from the single-station arguments.
 */
export async function createCollector( args: CliArgs, settings: Settings, factory = new StationFactory( settings ) ): Promise<Collector> {
	const collectorOptions = {
		fetch: { attempts: settings.httpAttempts, timeout: settings.httpTimeout },
		fallbackTimezone: settings.timezone,
	};

	if ( args.dir !== undefined ) {
		const dataDir = resolveDataDir( args.dir );
		const stations = new Map<string, Station>();
		for ( const [ source, options ] of loadStationsConfig( dataDir ) ) {
			const id = toSourceId( source );
			stations.set( id, await factory.createStation( id, options, dataDir ) );
		}
		return new Collector( stations, collectorOptions );
	}

	const id = toSourceId( args.src );
	const station = await factory.createStation( id, args, ensureDataDir( settings.dataDir ) );
	return new Collector( new Map( [ [ id, station ] ] ), collectorOptions );
}
