import { TZDate } from "@date-fns/tz";
import { format } from "date-fns";
import { find } from "geo-tz";

/**
 * Samples collected since local midnight of `date`. Every sample belongs to that calendar day.
 */
export interface DailyExtremesState {
	/** The tracked calendar day (yyyy-MM-dd) in `timezone`, null before the first update. */
	date: string | null;
	/** IANA time zone the calendar days are counted in. */
	timezone: string;
	temperatures: number[];
	humidities: number[];
	gusts: number[];
}

export interface ExtremesUpdate {
	temperature: number;
	humidity: number;
	gust: number;
	epoch: number;
}

export interface DailyExtremes {
	tempMax: number;
	tempMin: number;
	rhMax: number;
	rhMin: number;
	gustMax: number;
}

export function createDailyExtremes( timezone: string ): DailyExtremesState {
	return { date: null, timezone, temperatures: [], humidities: [], gusts: [] };
}

/**
 * Finds the time zone of a location, or returns the fallback if the coordinates are unknown or not covered.
 */
export function timezoneForLocation( lat: number, lon: number, fallback: string ): string {
	if ( !Number.isFinite( lat ) || !Number.isFinite( lon ) ) {
		return fallback;
	}
	try {
		return find( lat, lon )[ 0 ] ?? fallback;
	} catch ( err ) {
		console.warn( `[Extremes] No time zone for (${ lat }, ${ lon }), using ${ fallback }:`, err );
		return fallback;
	}
}

/** The calendar day (yyyy-MM-dd) of a Unix epoch in a time zone. */
export function localDate( epoch: number, timezone: string ): string {
	return format( new TZDate( epoch * 1000, timezone ), "yyyy-MM-dd" );
}

/**
 * Adds a reading to the day's samples. A reading from another calendar day starts a new day first. NaN values are
 * skipped, as is a reading without a usable timestamp.
 */
export function updateDailyExtremes( state: DailyExtremesState, update: ExtremesUpdate ): void {
	if ( !Number.isFinite( update.epoch ) ) {
		return;
	}

	const date = localDate( update.epoch, state.timezone );
	if ( date !== state.date ) {
		Object.assign( state, { date, temperatures: [], humidities: [], gusts: [] } );
	}

	if ( !Number.isNaN( update.temperature ) ) state.temperatures.push( update.temperature );
	if ( !Number.isNaN( update.humidity ) ) state.humidities.push( update.humidity );
	if ( !Number.isNaN( update.gust ) ) state.gusts.push( update.gust );
}

function max( values: readonly number[] ): number {
	return values.length > 0 ? values.reduce( ( a, b ) => Math.max( a, b ) ) : NaN;
}

function min( values: readonly number[] ): number {
	return values.length > 0 ? values.reduce( ( a, b ) => Math.min( a, b ) ) : NaN;
}

export function getDailyExtremes( state: DailyExtremesState ): DailyExtremes {
	return {
		tempMax: max( state.temperatures ),
		tempMin: min( state.temperatures ),
		rhMax: max( state.humidities ),
		rhMin: min( state.humidities ),
		gustMax: max( state.gusts )
	};
}
