import { Server } from "http";
import express from "express";
import { find as findTimezones } from "geo-tz";
import { DisplayData, GeoCoordinates, Station } from "../types";
import { formatDate, formatForecast, formatTime } from "./normalization/displayData";
import { renderConsoleText } from "../display";

/**
 * Resolves the IANA time zone of a station: the explicit zone, else the zone at its coordinates, else the
 * fallback, else the zone of this process.
 */
export function getTZ( station: Station, fallback?: string ): string {
	if ( station.timezone ) {
		return station.timezone;
	}

	// 0/0 is the default of stations created without coordinates.
	if ( station.latitude !== 0 || station.longitude !== 0 ) {
		const coordinates: GeoCoordinates = [ station.latitude, station.longitude ];
		const zone = findTimezones( coordinates[ 0 ], coordinates[ 1 ] )[ 0 ];
		if ( zone ) {
			return zone;
		}
	}

	return fallback || Intl.DateTimeFormat().resolvedOptions().timeZone;
}

export interface WeatherResponse {
	stationName: string;
	/** ISO 8601 timestamp of the current values, null if unknown. */
	dateTime: string | null;
	date: string;
	time: string;
	temperature: number | null;
	dewPoint: number | null;
	precipitation: number | null;
	forecast: number;
	forecastDescription: string;
	dailyMin: number | null;
	dailyMax: number | null;
}

const orNull = ( value: number ): number | null => Number.isNaN( value ) ? null : value;

export function toWeatherResponse( data: DisplayData ): WeatherResponse {
	return {
		stationName: data.stationName,
		dateTime: data.dateTime ? data.dateTime.toISOString() : null,
		date: formatDate( data ),
		time: formatTime( data ),
		temperature: orNull( data.temperature ),
		dewPoint: orNull( data.dewPoint ),
		precipitation: orNull( data.precipitation ),
		forecast: data.forecast,
		forecastDescription: formatForecast( data ),
		dailyMin: orNull( data.dailyMin ),
		dailyMax: orNull( data.dailyMax ),
	};
}

/**
 * HTTP output: serves the last record shown by the controller.
 * @param latest Returns the last record, or undefined before the first update finished.
 */
export function createApp( latest: () => DisplayData | undefined ): express.Express {
	const app = express();

	app.get( "/weather", ( req: express.Request, res: express.Response ) => {
		const data = latest();
		if ( !data ) {
			res.status( 503 ).json( { error: "No weather data available yet" } );
			return;
		}
		res.json( toWeatherResponse( data ) );
	} );

	app.get( "/weather.txt", ( req: express.Request, res: express.Response ) => {
		const data = latest();
		if ( !data ) {
			res.status( 503 ).type( "text/plain" ).send( "No weather data available yet\n" );
			return;
		}
		res.type( "text/plain" ).send( renderConsoleText( data ) + "\n" );
	} );

	return app;
}

/**
 * Start the HTTP output. A server that cannot listen (for example because the port is taken) is logged
 * and reported to `onError`.
 */
export function serveDisplayData( latest: () => DisplayData | undefined, port: number, onError: ( err: Error ) => void ): Server {
	const server = createApp( latest ).listen( port, () => {
		console.log( `[HTTP] Serving weather data on port ${ port }` );
	} );
	server.on( "error", ( err: Error ) => {
		console.error( `[HTTP] Connection Error: cannot serve on port ${ port }:`, err.message );
		onError( err );
	} );
	return server;
}
