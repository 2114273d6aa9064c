import "dotenv/config";

import express from "express";

import { AppConfig, loadConfig } from "./config";
import { describeError } from "./errors";
import { createReadingsRouter, errorHandler } from "./routes/readings";
import { StationRegistry } from "./routes/stations/StationRegistry";
import { createStationProviders } from "./routes/stations/providers";
import { SessionStore } from "./services/session";

export function createApp(
	config: AppConfig,
	store: SessionStore = new SessionStore( { idleMinutes: config.sessionIdleMinutes, maxSessions: config.maxSessions } ),
	registry?: StationRegistry
): express.Express {
	const app = express();
	app.use( express.json() );
	app.use( createReadingsRouter( store, registry ?? new StationRegistry( createStationProviders( config.stationsLocation ) ), config ) );
	app.use( errorHandler );
	return app;
}

if ( require.main === module ) {
	let config: AppConfig;
	try {
		config = loadConfig();
	} catch ( err ) {
		console.error( `[Server] Invalid configuration: ${ describeError( err ) }` );
		process.exit( 1 );
	}

	createApp( config ).listen( config.port, () => {
		console.log( `[Server] Station metrics listening on port ${ config.port } (stations: ${ config.stationsLocation })` );
	} );
}
