import fs from "fs";
import path from "path";
import * as cheerio from "cheerio";
import { isValid, parse } from "date-fns";
import { z } from "zod";

import { Station } from "../../types";
import { CodedError, ErrorCode } from "../../errors";
import { createFetcher, Fetcher } from "../weatherSources/fetchWithRetry";
import { BROWSER_USER_AGENT, SourceRequest } from "../weatherSources/SourceExtractor";

/** Station name mapped to the remaining cells of its row, keyed by column header. */
export type StationTable = Record<string, Record<string, string>>;

export const STATIONS_REQUEST: SourceRequest = {
	url: "https://www.dwd.de/DE/leistungen/klimadatendeutschland/statliste/statlex_html.html",
	params: { view: "nasPublication", nn: "16102" },
	headers: { "User-Agent": BROWSER_USER_AGENT },
};

/** Rows of this kind are synoptic stations, the only ones with hourly measurements. */
const SYNOPTIC_KIND = "SY";

const stationTableSchema = z.record( z.string(), z.record( z.string(), z.string() ) );

const clean = ( text: string ): string => text.replace( /\u00a0/g, " " );

/**
 * Reduce the DWD station list page to its synoptic stations. The second row of the table holds the column
 * headers, data rows follow from the third row; the first cell of a row is the station name.
 */
export function parseStationsPage( html: string ): StationTable {
	const $ = cheerio.load( html );
	const rows = $( "table" ).first().find( "tr" ).toArray();
	if ( rows.length < 2 ) {
		return {};
	}

	const columns = $( rows[ 1 ] ).children( "th" ).toArray().map( th => $( th ).text() );

	const table: StationTable = {};
	for ( const row of rows.slice( 2 ) ) {
		let name = "";
		const info: Record<string, string> = {};
		$( row ).children( "td" ).each( ( i, td ) => {
			const text = clean( $( td ).text() );
			if ( i === 0 ) {
				name = text;
			} else if ( i < columns.length ) {
				info[ columns[ i ] ] = text;
			}
		} );

		if ( findColumn( info, "kennung" ) === SYNOPTIC_KIND ) {
			table[ name ] = info;
		}
	}

	return table;
}

/** Header texts vary in hyphenation and spacing, so columns are matched on their letters only. */
function findColumn( info: Record<string, string>, key: string ): string | undefined {
	for ( const [ column, value ] of Object.entries( info ) ) {
		if ( column.toLowerCase().replace( /[^\p{L}]/gu, "" ) === key ) {
			return value.trim();
		}
	}
	return undefined;
}

function toNumber( text: string | undefined ): number {
	const value = Number( ( text ?? "" ).replace( ",", "." ) );
	return text === undefined || text === "" || Number.isNaN( value ) ? 0 : value;
}

function toDate( text: string | undefined ): Date | undefined {
	if ( !text ) {
		return undefined;
	}
	const date = parse( text, "dd.MM.yyyy", new Date( 0 ) );
	return isValid( date ) ? date : undefined;
}

export function toStation( name: string, info: Record<string, string> ): Station {
	return {
		name,
		number: toNumber( findColumn( info, "stationsid" ) ),
		type: findColumn( info, "kennung" ) ?? "",
		identifier: findColumn( info, "stationskennung" ) ?? "0",
		latitude: toNumber( findColumn( info, "breite" ) ),
		longitude: toNumber( findColumn( info, "länge" ) ),
		altitude: toNumber( findColumn( info, "stationshöhe" ) ),
		riverBasin: findColumn( info, "flussgebiet" ) ?? "",
		state: findColumn( info, "bundesland" ) ?? "",
		start: toDate( findColumn( info, "beginn" ) ),
		end: toDate( findColumn( info, "ende" ) ),
	};
}

export interface StationDirectoryOptions {
	/** Directory of the cache file. */
	dataDir: string;
	/** Age in hours after which the cache file is refreshed. */
	refreshHours?: number;
	fileName?: string;
	fetcher?: Fetcher;
	clock?: () => Date;
}

/**
 * The DWD station list, cached as a JSON file in the data directory.
 */
export class StationDirectory {
	private readonly cacheFile: string;
	private readonly refreshHours: number;
	private readonly fetcher: Fetcher;
	private readonly clock: () => Date;
	private table: StationTable = {};

	public constructor( options: StationDirectoryOptions ) {
		this.cacheFile = path.join( options.dataDir, options.fileName ?? "dwd_stations.json" );
		this.refreshHours = options.refreshHours ?? 24;
		this.fetcher = options.fetcher ?? createFetcher( undefined, undefined, "StationDirectory" );
		this.clock = options.clock ?? ( () => new Date() );
	}

	public get size(): number {
		return Object.keys( this.table ).length;
	}

	/**
	 * Load the station list from the cache file, or download it when the file is missing or outdated. A
	 * failed download falls back to the existing file.
	 * @returns true if stations are available afterwards.
	 */
	public async update(): Promise<boolean> {
		if ( this.isCacheFresh() ) {
			this.table = this.loadCache();
			if ( this.size === 0 ) {
				console.warn( "[StationDirectory] Data Error: No data available from json file." );
				return false;
			}
			return true;
		}

		const body = await this.fetcher( STATIONS_REQUEST );
		const table = body === undefined ? {} : parseStationsPage( body );
		if ( Object.keys( table ).length > 0 ) {
			// An unsaved list is still usable for this run.
			this.saveCache( table );
			this.table = table;
			return true;
		}

		console.warn( "[StationDirectory] Data Error: No stations downloaded, using cached list" );
		this.table = this.loadCache();
		return this.size > 0;
	}

	public getStationByName( name: string ): Station {
		const info = this.table[ name ];
		if ( !info ) {
			throw new CodedError( ErrorCode.StationNotFound, `No DWD station named "${ name }"` );
		}
		return toStation( name, info );
	}

	/** The station closest to the position, by straight-line distance in degrees. */
	public getStationByDistance( latitude: number, longitude: number ): Station {
		let closest: Station | undefined;
		let minDistance = Infinity;
		for ( const [ name, info ] of Object.entries( this.table ) ) {
			const station = toStation( name, info );
			const distance = Math.hypot( station.latitude - latitude, station.longitude - longitude );
			if ( distance < minDistance ) {
				minDistance = distance;
				closest = station;
			}
		}

		if ( !closest ) {
			throw new CodedError( ErrorCode.StationNotFound, `No DWD station near ${ latitude }, ${ longitude }` );
		}
		return closest;
	}

	private isCacheFresh(): boolean {
		if ( !fs.existsSync( this.cacheFile ) ) {
			return false;
		}
		const ageHours = ( this.clock().getTime() - fs.statSync( this.cacheFile ).mtimeMs ) / 3600000;
		return ageHours <= this.refreshHours;
	}

	private loadCache(): StationTable {
		if ( !fs.existsSync( this.cacheFile ) ) {
			console.warn( `[StationDirectory] I/O Error: ${ this.cacheFile } does not exist` );
			return {};
		}

		try {
			const result = stationTableSchema.safeParse( JSON.parse( fs.readFileSync( this.cacheFile, "utf-8" ) ) );
			if ( !result.success ) {
				console.warn( `[StationDirectory] Data Error: Unexpected content in ${ this.cacheFile }` );
				return {};
			}
			return result.data;
		} catch ( err ) {
			console.error( "[StationDirectory] I/O Error:", err );
			return {};
		}
	}

	private saveCache( table: StationTable ): boolean {
		try {
			fs.mkdirSync( path.dirname( this.cacheFile ), { recursive: true } );
			fs.writeFileSync( this.cacheFile, JSON.stringify( table, null, 4 ) );
			return true;
		} catch ( err ) {
			console.error( "[StationDirectory] I/O Error:", err );
			return false;
		}
	}
}
