#!/usr/bin/env node
import { Server } from "http";

import { CliArgs, createCollector, parseCliArgs, USAGE, VERSION } from "./cli";
import { loadSettings } from "./config";
import { Controller } from "./controller";
import { ConsoleDisplay } from "./display";
import { serveDisplayData } from "./routes/weather";

/** Output channels selected with -o. */
export enum Output {
	ConsoleOnce = 0,
	ConsoleLoop = 1,
	HttpLoop = 2,
}

export async function main( argv: string[] ): Promise<number> {
	let args: CliArgs;
	try {
		args = parseCliArgs( argv );
	} catch ( err ) {
		console.error( err instanceof Error ? err.message : String( err ) );
		console.error( USAGE );
		return 2;
	}

	if ( args.help ) {
		console.log( USAGE );
		return 0;
	}
	if ( args.version ) {
		console.log( `weather-panel ${ VERSION }` );
		return 0;
	}

	const settings = loadSettings();
	const collector = await createCollector( args, settings );
	const display = new ConsoleDisplay();

	if ( args.out === Output.ConsoleOnce ) {
		display.show( await collector.getDisplayData() );
		return 0;
	}

	const controller = new Controller( collector, display, settings.refreshMinutes );
	const stop = () => {
		console.log( "[Main] Exiting" );
		void controller.exit();
	};
	process.once( "SIGINT", stop );
	process.once( "SIGTERM", stop );

	let server: Server | undefined;
	if ( args.out === Output.HttpLoop ) {
		server = serveDisplayData( () => controller.latest, settings.port, () => {
			void controller.exit();
		} );
	}

	await controller.run();
	if ( server?.listening ) {
		server.close();
	}
	return 0;
}

main( process.argv.slice( 2 ) ).then( code => {
	process.exitCode = code;
} ).catch( ( err: unknown ) => {
	console.error( "[Main] Fatal error:", err );
	process.exitCode = 1;
} );
