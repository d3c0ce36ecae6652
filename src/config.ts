import fs from "fs";
import os from "os";
import path from "path";
import dotenv from "dotenv";
import { z } from "zod";

dotenv.config( { override: false } );

/** Options of one station, as given on the command line or in stations.json. */
export interface StationOptions {
	name?: string;
	id?: string;
	lat?: number;
	lon?: number;
	timezone?: string;
}

export interface Settings {
	dataDir: string;
	httpAttempts: number;
	/** Seconds. */
	httpTimeout: number;
	refreshMinutes: number;
	stationsRefreshHours: number;
	timezone?: string;
	port: number;
}

const positiveInt = ( fallback: number ) => z.coerce.number().int().positive().catch( fallback );

const settingsSchema = z.object( {
	WEATHER_DATA_DIR: z.string().optional(),
	HTTP_ATTEMPTS: positiveInt( 3 ),
	HTTP_TIMEOUT: z.coerce.number().positive().catch( 10 ),
	REFRESH_MINUTES: z.coerce.number().positive().catch( 10 ),
	STATIONS_REFRESH_HOURS: z.coerce.number().nonnegative().catch( 24 ),
	TIMEZONE: z.string().optional(),
	PORT: positiveInt( 8080 ),
} );

export const DEFAULT_DATA_DIR = path.join( os.homedir(), ".weather-panel" );

/**
 * Settings from the environment. Missing or unusable values fall back to their defaults.
 */
export function loadSettings( env: NodeJS.ProcessEnv = process.env ): Settings {
	const parsed = settingsSchema.parse( env );
	return {
		dataDir: parsed.WEATHER_DATA_DIR || DEFAULT_DATA_DIR,
		httpAttempts: parsed.HTTP_ATTEMPTS,
		httpTimeout: parsed.HTTP_TIMEOUT,
		refreshMinutes: parsed.REFRESH_MINUTES,
		stationsRefreshHours: parsed.STATIONS_REFRESH_HOURS,
		timezone: parsed.TIMEZONE || undefined,
		port: parsed.PORT,
	};
}

const stationOptionsSchema = z.object( {
	name: z.string().optional(),
	id: z.union( [ z.string(), z.number() ] ).transform( String ).optional(),
	lat: z.number().optional(),
	lon: z.number().optional(),
	timezone: z.string().optional(),
} );

const stationsConfigSchema = z.record( z.string(), stationOptionsSchema );

export const STATIONS_CONFIG_FILE = "stations.json";

/**
 * Read stations.json from the data directory. Keys are source names, in priority order. A missing or invalid
 * file results in an empty configuration.
 */
export function loadStationsConfig( dataDir: string ): Map<string, StationOptions> {
	const file = path.join( dataDir, STATIONS_CONFIG_FILE );
	if ( !fs.existsSync( file ) ) {
		console.warn( `[Config] I/O Error: ${ file } does not exist` );
		return new Map();
	}

	let content: unknown;
	try {
		content = JSON.parse( fs.readFileSync( file, "utf-8" ) );
	} catch ( err ) {
		console.error( `[Config] I/O Error: Cannot read ${ file }:`, err );
		return new Map();
	}

	const result = stationsConfigSchema.safeParse( content );
	if ( !result.success ) {
		console.error( `[Config] I/O Error: Invalid ${ file }: ${ result.error.issues.map( issue => `${ issue.path.join( "." ) } ${ issue.message }` ).join( "; " ) }` );
		return new Map();
	}

	return new Map( Object.entries( result.data ) );
}

/** Create the data directory if needed. */
export function ensureDataDir( dataDir: string ): string {
	fs.mkdirSync( dataDir, { recursive: true } );
	return dataDir;
}
