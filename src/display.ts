import { DisplayData } from "./types";
import { formatDate, formatForecast, formatTime } from "./routes/normalization/displayData";

const SEPARATOR = "-".repeat( 46 );
const MAX_NAME_LENGTH = 37;

/** Fixed-point number right-aligned to `width`; unavailable values print as "NAN". */
export function formatFixed( value: number, width: number, decimals = 1 ): string {
	let text: string;
	if ( Number.isNaN( value ) ) {
		text = "NAN";
	} else if ( !Number.isFinite( value ) ) {
		text = value > 0 ? "INF" : "-INF";
	} else {
		text = value.toFixed( decimals );
	}
	return text.padStart( width );
}

export function renderConsoleText( data: DisplayData ): string {
	const stationName = data.stationName.length > MAX_NAME_LENGTH
		? data.stationName.slice( 0, MAX_NAME_LENGTH - 1 ) + "."
		: data.stationName;

	return [
		`Station: ${ stationName }`,
		SEPARATOR,
		`Date: ${ formatDate( data ) }`,
		`Daily forecast: ${ formatForecast( data ) }`,
		`Daily max. temp.: ${ formatFixed( data.dailyMax, 5 ) } °C`,
		`Daily min. temp.: ${ formatFixed( data.dailyMin, 5 ) } °C`,
		SEPARATOR,
		`Time: ${ formatTime( data ) }`,
		`Temperature: ${ formatFixed( data.temperature, 5 ) } °C`,
		`Dew point: ${ formatFixed( data.dewPoint, 5 ) } °C`,
		`Precipitation: ${ formatFixed( data.precipitation, 4 ) } mm`,
	].join( "\n" );
}

/** An output channel for merged records. */
export interface Display {
	show( data: DisplayData ): void;
}

/** Console output channel. */
export class ConsoleDisplay implements Display {
	public show( data: DisplayData ): void {
		console.log( renderConsoleText( data ) );
	}
}
