import {
	DEFAULT_RAIN_DECAY_MINUTES, RAIN_BOOTSTRAP_RATE, RAIN_HEAVY, RAIN_HISTORY_CAPACITY, RAIN_LIGHT, RAIN_MODERATE,
	RAIN_MODERATE_LIGHT, RAIN_TRACE, RAIN_VERY_HEAVY, RAIN_VERY_LIGHT
} from "../config";

/** A point of the cumulative daily rain counter. */
export interface RainSample {
	epoch: number;
	totalMm: number;
}

/**
 * Rain counter history of one session. Only changes of the counter ("tips") are stored, so the samples are
 * strictly increasing in total while the day lasts.
 */
export interface RainHistoryState {
	samples: RainSample[];
	lastTip: RainSample | null;
	previousTip: RainSample | null;
	/** Wall-clock epoch seconds of the last detected change, independent of the data timestamps. */
	lastChangeTime: number | null;
}

export interface RainRates {
	/** Rate between the last two tips (mm/h). */
	instant: number;
	/** Average rate over the last minute (mm/h). */
	rate1min: number;
	/** Average rate over the last five minutes (mm/h). */
	rate5min: number;
}

// A decrease larger than this means the counter was reset
const RESET_EPSILON = 1e-6;
// Totals closer than this count as unchanged
const CHANGE_EPSILON = 1e-9;

export function createRainHistory(): RainHistoryState {
	return { samples: [], lastTip: null, previousTip: null, lastChangeTime: null };
}

export function resetRainHistory( state: RainHistoryState ): void {
	state.samples = [];
	state.lastTip = null;
	state.previousTip = null;
	state.lastChangeTime = null;
}

/**
 * Average rate over a window ending at the current sample. Starts at the newest sample at or before the window start,
 * or at the oldest sample if the history doesn't reach that far back.
 */
function windowRate( samples: readonly RainSample[], now: RainSample, windowSeconds: number ): number {
	if ( samples.length === 0 ) {
		return NaN;
	}

	const target = now.epoch - windowSeconds;
	let start = samples[ 0 ];
	for ( let i = samples.length - 1; i >= 0; i-- ) {
		if ( samples[ i ].epoch <= target ) {
			start = samples[ i ];
			break;
		}
	}

	const dt = now.epoch - start.epoch;
	const dp = now.totalMm - start.totalMm;
	if ( dt <= 0 || dp < 0 ) {
		return NaN;
	}
	return ( dp / dt ) * 3600;
}

/**
 * Feeds the daily rain counter into the session history and computes rain rates.
 *
 * @param totalMm The precipitation accumulated today (mm).
 * @param dataEpoch The timestamp of the reading the total comes from.
 * @param wallClockNow The current wall-clock time, used only to detect that rain has stopped.
 * @param decayMinutes Wall-clock minutes without a new tip after which the instant rate is reported as 0.
 */
export function rainRatesFromTotal(
	state: RainHistoryState,
	totalMm: number,
	dataEpoch: number,
	wallClockNow: number,
	decayMinutes: number = DEFAULT_RAIN_DECAY_MINUTES
): RainRates {
	if ( Number.isNaN( totalMm ) || Number.isNaN( dataEpoch ) ) {
		return { instant: NaN, rate1min: NaN, rate5min: NaN };
	}

	const last = state.samples.length > 0 ? state.samples[ state.samples.length - 1 ] : undefined;
	if ( last && totalMm + RESET_EPSILON < last.totalMm ) {
		console.log( `[Rain] Counter went from ${ last.totalMm } to ${ totalMm } mm, resetting history` );
		resetRainHistory( state );
	}

	// Dry readings are not tracked
	if ( totalMm > CHANGE_EPSILON ) {
		const newest = state.samples[ state.samples.length - 1 ];
		if ( !newest || Math.abs( totalMm - newest.totalMm ) > CHANGE_EPSILON ) {
			const tip = { epoch: dataEpoch, totalMm };
			state.samples.push( tip );
			if ( state.samples.length > RAIN_HISTORY_CAPACITY ) {
				state.samples.shift();
			}
			state.previousTip = state.lastTip;
			state.lastTip = tip;
			state.lastChangeTime = wallClockNow;
		}
	}

	let instant = NaN;
	const { lastTip, previousTip } = state;
	if ( lastTip && lastTip.totalMm > CHANGE_EPSILON ) {
		if ( previousTip ) {
			const dp = lastTip.totalMm - previousTip.totalMm;
			const dt = lastTip.epoch - previousTip.epoch;
			if ( dp > 0 && dt > 0 ) {
				instant = ( dp / dt ) * 3600;
			}
		} else {
			// First tip of the day: there is no slope yet
			instant = RAIN_BOOTSTRAP_RATE;
		}

		if ( state.lastChangeTime !== null && wallClockNow - state.lastChangeTime > decayMinutes * 60 ) {
			instant = 0;
		}
	}

	const current = { epoch: dataEpoch, totalMm };
	return {
		instant,
		rate1min: windowRate( state.samples, current, 60 ),
		rate5min: windowRate( state.samples, current, 300 )
	};
}

export type RainIntensity =
	| "none"
	| "trace"
	| "very-light"
	| "light"
	| "moderate-light"
	| "moderate"
	| "heavy"
	| "very-heavy"
	| "torrential";

// Upper bounds (exclusive) of each level, ascending
const INTENSITY_LEVELS: ReadonlyArray<[ number, RainIntensity ]> = [
	[ RAIN_TRACE, "trace" ],
	[ RAIN_VERY_LIGHT, "very-light" ],
	[ RAIN_LIGHT, "light" ],
	[ RAIN_MODERATE_LIGHT, "moderate-light" ],
	[ RAIN_MODERATE, "moderate" ],
	[ RAIN_HEAVY, "heavy" ],
	[ RAIN_VERY_HEAVY, "very-heavy" ]
];

export function rainIntensity( rateMmH: number ): RainIntensity {
	if ( Number.isNaN( rateMmH ) || rateMmH <= 0 ) {
		return "none";
	}
	const level = INTENSITY_LEVELS.find( ( [ upper ] ) => rateMmH < upper );
	return level ? level[ 1 ] : "torrential";
}

const INTENSITY_LABELS: Readonly<Record<RainIntensity, string>> = {
	"none": "No precipitation",
	"trace": "Trace of precipitation",
	"very-light": "Very light rain",
	"light": "Light rain",
	"moderate-light": "Light to moderate rain",
	"moderate": "Moderate rain",
	"heavy": "Heavy rain",
	"very-heavy": "Very heavy rain",
	"torrential": "Torrential rain"
};

export function rainIntensityLabel( rateMmH: number ): string {
	return INTENSITY_LABELS[ rainIntensity( rateMmH ) ];
}
