import express from "express";

import { AppConfig } from "../config";
import { CodedError, ErrorCode, describeError } from "../errors";
import { calculateTrend } from "../models/trends";
import { enrichReading } from "../services/enrichment";
import { getDailyExtremes } from "../services/extremes";
import { SessionStore } from "../services/session";
import { RawPayload, RemotePressureReading } from "../types";
import { NormalizationContext } from "./normalization/BaseNormalizer";
import { getNormalizer } from "./normalization/normalizers";
import { isRecord, parseEpoch, parseNumber } from "./normalization/parse";
import { DEFAULT_MAX_NAME_RESULTS, DEFAULT_MAX_RESULTS, StationRegistry } from "./stations/StationRegistry";
import { normalizeCoordinateOrder } from "./stations/coordinates";

const DEFAULT_SESSION = "local";

/** Returns the first string value of a query parameter. */
export function getParameter( parameter: unknown ): string | undefined {
	const value = Array.isArray( parameter ) ? parameter[ 0 ] : parameter;
	return typeof value === "string" ? value : undefined;
}

/** Flattens a query string into a payload of string values, keeping the first of repeated keys. */
export function queryToPayload( query: Readonly<Record<string, unknown>> ): RawPayload {
	const payload: Record<string, unknown> = {};
	for ( const [ key, value ] of Object.entries( query ) ) {
		const parameter = getParameter( value );
		if ( parameter !== undefined ) {
			payload[ key ] = parameter;
		}
	}
	return payload;
}

/**
 * Station details a client may pass next to a reading. A user-supplied elevation wins over the provider's.
 */
export function contextFromQuery( query: Readonly<Record<string, unknown>>, now: number ): NormalizationContext {
	const context: NormalizationContext = { now };
	const stationId = getParameter( query.stationId );
	if ( stationId ) context.stationId = stationId;
	for ( const key of [ "lat", "lon", "elevation" ] as const ) {
		const value = parseNumber( getParameter( query[ key ] ) );
		if ( !Number.isNaN( value ) ) {
			context[ key ] = value;
		}
	}
	return context;
}

/**
 * Builds the remote two-point pressure reading from a request body that carries `pressure3hAgo` and `epoch3hAgo`
 * next to the provider payload. The current point is the normalized reading's sea-level pressure.
 */
export function remotePressureFrom( body: RawPayload, pressureNow: number, epochNow: number ): RemotePressureReading | undefined {
	if ( !( "pressure3hAgo" in body ) ) {
		return undefined;
	}
	return {
		pressureNow,
		epochNow,
		pressure3hAgo: parseNumber( body.pressure3hAgo ),
		epoch3hAgo: parseEpoch( body.epoch3hAgo )
	};
}

export interface TrendRequest {
	values: number[];
	times: number[];
	intervalMinutes: number;
}

/**
 * Reads a trend request. Values may be null for gaps; times may be epoch seconds or date strings.
 * @throws CodedError(InvalidArgument) if the body is not a trend request.
 */
export function parseTrendRequest( body: unknown ): TrendRequest {
	const values: unknown = isRecord( body ) ? body.values : undefined;
	const times: unknown = isRecord( body ) ? body.times : undefined;
	if ( !isRecord( body ) || !Array.isArray( values ) || !Array.isArray( times ) ) {
		throw new CodedError( ErrorCode.InvalidArgument, "Expected { values: [], times: [], intervalMinutes }" );
	}
	const intervalMinutes = body.intervalMinutes === undefined ? 10 : parseNumber( body.intervalMinutes );
	return {
		values: values.map( ( value ) => parseNumber( value ) ),
		times: times.map( ( time ) => parseEpoch( time ) ),
		intervalMinutes
	};
}

function asyncRoute( handler: ( req: express.Request, res: express.Response ) => Promise<void> ): express.RequestHandler {
	return ( req, res, next ) => {
		handler( req, res ).catch( next );
	};
}

function nowSeconds(): number {
	return Math.floor( Date.now() / 1000 );
}

/**
 * Routes for feeding readings into sessions and querying derived data. NaN values serialize as null.
 */
export function createReadingsRouter( store: SessionStore, registry: StationRegistry, config: AppConfig ): express.Router {
	const router = express.Router();

	const enrichOptions = ( now: number ) => ( {
		now,
		pressureThresholds: config.pressureThresholds,
		rainDecayMinutes: config.rainDecayMinutes,
		defaultTimezone: config.defaultTimezone
	} );

	// Local station, Weather Underground upload protocol
	router.get( "/weatherstation/updateweatherstation.php", ( req, res ) => {
		const now = nowSeconds();
		const session = store.get( getParameter( req.query.session ) || DEFAULT_SESSION );
		const reading = getNormalizer( "LOCAL" ).normalize( queryToPayload( req.query ), contextFromQuery( req.query, now ) );
		enrichReading( session, reading, enrichOptions( now ) );
		res.send( "success\n" );
	} );

	router.post( "/sessions/:session/readings/:provider", ( req, res ) => {
		const body: unknown = req.body;
		if ( !isRecord( body ) ) {
			throw new CodedError( ErrorCode.InvalidArgument, "Expected a JSON object as request body" );
		}

		const now = nowSeconds();
		const normalizer = getNormalizer( req.params.provider );
		const reading = normalizer.normalize( body, contextFromQuery( req.query, now ) );
		const session = store.get( req.params.session );
		res.json( enrichReading( session, reading, {
			...enrichOptions( now ),
			remotePressure: remotePressureFrom( body, reading.pressureMsl, reading.epoch )
		} ) );
	} );

	router.get( "/sessions/:session", ( req, res ) => {
		if ( !store.has( req.params.session ) ) {
			res.status( 404 ).json( { error: `Unknown session "${ req.params.session }"` } );
			return;
		}
		const session = store.get( req.params.session );
		const extremes = session.currentExtremes;
		res.json( {
			session: session.id,
			reading: session.lastReading ?? null,
			extremes: extremes ? { ...getDailyExtremes( extremes ), date: extremes.date, timezone: extremes.timezone } : null
		} );
	} );

	router.delete( "/sessions/:session", ( req, res ) => {
		res.status( store.delete( req.params.session ) ? 204 : 404 ).end();
	} );

	router.get( "/stations/nearby", asyncRoute( async ( req, res ) => {
		const lat = parseNumber( getParameter( req.query.lat ) );
		const lon = parseNumber( getParameter( req.query.lon ) );
		const limitParameter = getParameter( req.query.limit );
		const limit = limitParameter === undefined ? DEFAULT_MAX_RESULTS : parseNumber( limitParameter );
		if ( Number.isNaN( lat ) || Number.isNaN( lon ) ) {
			throw new CodedError( ErrorCode.InvalidArgument, "lat and lon are required numbers" );
		}

		const coordinates = await normalizeCoordinateOrder( lat, lon, registry );
		const stations = await registry.searchNearbyStations( coordinates.lat, coordinates.lon, limit );
		res.json( { ...coordinates, stations } );
	} ) );

	router.get( "/stations/search", asyncRoute( async ( req, res ) => {
		const query = getParameter( req.query.q )?.trim();
		if ( !query ) {
			throw new CodedError( ErrorCode.InvalidArgument, "q is required" );
		}
		const limitParameter = getParameter( req.query.limit );
		const limit = limitParameter === undefined ? DEFAULT_MAX_NAME_RESULTS : parseNumber( limitParameter );
		res.json( { stations: await registry.searchStationsByName( query, limit ) } );
	} ) );

	router.get( "/stations/:provider/:stationId", asyncRoute( async ( req, res ) => {
		const station = await registry.findStation( req.params.provider, req.params.stationId );
		if ( !station ) {
			res.status( 404 ).json( { error: `Unknown station "${ req.params.stationId }"` } );
			return;
		}
		res.json( station );
	} ) );

	router.post( "/trends", ( req, res ) => {
		const { values, times, intervalMinutes } = parseTrendRequest( req.body );
		res.json( { trend: calculateTrend( values, times, intervalMinutes ) } );
	} );

	return router;
}

/**
 * Reports programmer errors (bad arguments, unknown providers) as 400 responses, an unreadable station inventory as
 * 503 and anything else as 500.
 */
export function errorHandler( err: unknown, req: express.Request, res: express.Response, next: express.NextFunction ): void {
	if ( res.headersSent ) {
		next( err );
		return;
	}
	if ( err instanceof CodedError ) {
		const status = err.errCode === ErrorCode.StationInventoryUnavailable ? 503 : 400;
		res.status( status ).json( { errCode: err.errCode, error: err.message } );
		return;
	}
	console.error( `[Server] ${ req.method } ${ req.path } failed: ${ describeError( err ) }` );
	res.status( 500 ).json( { error: "Internal server error" } );
}
