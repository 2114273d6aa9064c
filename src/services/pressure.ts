import { DEFAULT_PRESSURE_THRESHOLDS, PRESSURE_HISTORY_CAPACITY, PressureThresholds } from "../config";
import { RemotePressureReading } from "../types";

export interface PressureSample {
	epoch: number;
	pressure: number;
}

/** Bounded, time-ordered pressure history of one session. */
export interface PressureHistoryState {
	samples: PressureSample[];
	capacity: number;
}

export type PressureTrendLabel = "Stable" | "Rising fast" | "Rising" | "Falling fast" | "Falling" | "Unknown";

export type PressureTrendSource = "remote" | "local" | "none";

export interface PressureTrend {
	/** Pressure change over the period (hPa). */
	deltaHpa: number;
	/** Rate of change (hPa/h). */
	ratePerHour: number;
	label: PressureTrendLabel;
	arrow: string;
	source: PressureTrendSource;
}

const THREE_HOURS = 3 * 3600;

export function createPressureHistory( capacity: number = PRESSURE_HISTORY_CAPACITY ): PressureHistoryState {
	return { samples: [], capacity };
}

/**
 * Appends a sample. NaN pressures and samples that are not newer than the last stored one are ignored.
 * @return Whether the sample was stored.
 */
export function pushPressure( state: PressureHistoryState, pressure: number, epoch: number ): boolean {
	if ( Number.isNaN( pressure ) || Number.isNaN( epoch ) ) {
		return false;
	}
	const last = state.samples[ state.samples.length - 1 ];
	if ( last && epoch <= last.epoch ) {
		return false;
	}
	state.samples.push( { epoch, pressure } );
	while ( state.samples.length > state.capacity ) {
		state.samples.shift();
	}
	return true;
}

/**
 * Classifies a 3-hour pressure change. A change at exactly the stable threshold still counts as stable.
 */
export function classifyPressureTrend(
	deltaHpa: number,
	thresholds: PressureThresholds = DEFAULT_PRESSURE_THRESHOLDS
): { label: PressureTrendLabel, arrow: string } {
	if ( Number.isNaN( deltaHpa ) ) {
		return { label: "Unknown", arrow: "•" };
	}
	if ( Math.abs( deltaHpa ) <= thresholds.stable ) {
		return { label: "Stable", arrow: "→" };
	}
	if ( deltaHpa > 0 ) {
		return deltaHpa > thresholds.rapidChange ? { label: "Rising fast", arrow: "⬆" } : { label: "Rising", arrow: "↗" };
	}
	return deltaHpa < -thresholds.rapidChange ? { label: "Falling fast", arrow: "⬇" } : { label: "Falling", arrow: "↘" };
}

function trendFrom( deltaHpa: number, seconds: number, source: PressureTrendSource, thresholds: PressureThresholds ): PressureTrend {
	return {
		deltaHpa,
		ratePerHour: deltaHpa / ( seconds / 3600 ),
		...classifyPressureTrend( deltaHpa, thresholds ),
		source
	};
}

function isUsableRemote( remote: RemotePressureReading | undefined ): remote is RemotePressureReading {
	return remote !== undefined
		&& [ remote.pressureNow, remote.epochNow, remote.pressure3hAgo, remote.epoch3hAgo ].every( Number.isFinite )
		&& remote.epochNow > remote.epoch3hAgo;
}

/**
 * Pressure trend over the last 3 hours.
 *
 * A remote two-point reading is used when it is complete. Otherwise the local history is used: the latest sample is
 * compared with the newest sample at least 3 hours older, or with the oldest sample if the history is shorter. The
 * two sources are never mixed.
 */
export function pressureTrend3h(
	state: PressureHistoryState,
	remote?: RemotePressureReading,
	thresholds: PressureThresholds = DEFAULT_PRESSURE_THRESHOLDS
): PressureTrend {
	if ( isUsableRemote( remote ) ) {
		return trendFrom( remote.pressureNow - remote.pressure3hAgo, remote.epochNow - remote.epoch3hAgo, "remote", thresholds );
	}

	const { samples } = state;
	if ( samples.length >= 2 ) {
		const latest = samples[ samples.length - 1 ];
		const target = latest.epoch - THREE_HOURS;

		let reference = samples[ 0 ];
		for ( const sample of samples ) {
			if ( sample.epoch > target ) {
				break;
			}
			reference = sample;
		}

		const dt = latest.epoch - reference.epoch;
		if ( dt > 0 ) {
			return trendFrom( latest.pressure - reference.pressure, dt, "local", thresholds );
		}
	}

	return { deltaHpa: NaN, ratePerHour: NaN, label: "Unknown", arrow: "•", source: "none" };
}

/**
 * Plain-language outlook for a 3-hour pressure change. Advisory text only.
 */
export function pressureOutlook( deltaHpa: number ): string {
	if ( Number.isNaN( deltaHpa ) ) {
		return "Insufficient data";
	}
	if ( Math.abs( deltaHpa ) < 0.5 ) {
		return "Steady conditions";
	} else if ( deltaHpa > 3 ) {
		return "Rapid improvement, high pressure moving in";
	} else if ( deltaHpa > 1.5 ) {
		return "Gradual improvement, clearing skies";
	} else if ( deltaHpa > 0 ) {
		return "Slight improvement";
	} else if ( deltaHpa < -3 ) {
		return "Rapid deterioration, storm possible";
	} else if ( deltaHpa < -1.5 ) {
		return "Gradual deterioration, rain likely";
	}
	return "Slight deterioration";
}
