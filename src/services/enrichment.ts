import { DEFAULT_PRESSURE_THRESHOLDS, DEFAULT_RAIN_DECAY_MINUTES, PressureThresholds } from "../config";
import { RadiationMetrics, deriveRadiation } from "../models/radiation";
import { ThermodynamicMetrics, deriveThermodynamics } from "../models/thermodynamics";
import { validateReading } from "../routes/normalization/ReadingValidator";
import { degreesToCompass } from "../routes/normalization/converters";
import { CanonicalReading, RemotePressureReading, ValidationResult } from "../types";
import { DailyExtremes, getDailyExtremes, timezoneForLocation, updateDailyExtremes } from "./extremes";
import { PressureTrend, pressureOutlook, pressureTrend3h, pushPressure } from "./pressure";
import { RainIntensity, RainRates, rainIntensity, rainIntensityLabel, rainRatesFromTotal } from "./rain";
import type { WeatherSession } from "./session";

export interface EnrichOptions {
	/** Wall-clock Unix epoch seconds. */
	now: number;
	/** A provider's two-point pressure reading, preferred over the local history. */
	remotePressure?: RemotePressureReading;
	pressureThresholds?: PressureThresholds;
	rainDecayMinutes?: number;
	/** Time zone for calendar days when the station's location is unknown. */
	defaultTimezone: string;
}

export interface EnrichedReading {
	reading: CanonicalReading;
	thermodynamics: ThermodynamicMetrics;
	radiation: RadiationMetrics;
	/** 16-point abbreviation of the wind direction, "—" if unknown. */
	windCompass: string;
	rain: RainRates & { intensity: RainIntensity, label: string };
	pressureTrend: PressureTrend & { outlook: string };
	extremes: DailyExtremes & { date: string | null, timezone: string };
	validation: ValidationResult;
	/** Seconds between the reading's timestamp and `now`. */
	dataAgeSeconds: number;
}

/**
 * Runs a canonical reading through every derived-metric component, updating the session's histories on the way.
 * Validation problems are reported in the result and never stop the enrichment.
 */
export function enrichReading( session: WeatherSession, reading: CanonicalReading, options: EnrichOptions ): EnrichedReading {
	const { now } = options;
	const validation = validateReading( reading, { now } );
	if ( validation.errors.length > 0 ) {
		console.warn( `[Enrichment] Session "${ session.id }": ${ validation.errors.join( "; " ) }` );
	}

	const rates = rainRatesFromTotal(
		session.rain, reading.precipTotal, reading.epoch, now, options.rainDecayMinutes ?? DEFAULT_RAIN_DECAY_MINUTES
	);

	pushPressure( session.pressure, reading.pressureAbsolute, reading.epoch );
	const trend = pressureTrend3h( session.pressure, options.remotePressure, options.pressureThresholds ?? DEFAULT_PRESSURE_THRESHOLDS );

	const timezone = timezoneForLocation( reading.station.lat, reading.station.lon, options.defaultTimezone );
	const extremesState = session.extremes( timezone );
	updateDailyExtremes( extremesState, {
		temperature: reading.temperature,
		humidity: reading.humidity,
		gust: reading.windGust,
		epoch: reading.epoch
	} );

	const enriched: EnrichedReading = {
		reading,
		thermodynamics: deriveThermodynamics( reading ),
		radiation: deriveRadiation( reading ),
		windCompass: degreesToCompass( reading.windDirection ),
		rain: { ...rates, intensity: rainIntensity( rates.instant ), label: rainIntensityLabel( rates.instant ) },
		pressureTrend: { ...trend, outlook: pressureOutlook( trend.deltaHpa ) },
		extremes: { ...getDailyExtremes( extremesState ), date: extremesState.date, timezone },
		validation,
		dataAgeSeconds: now - reading.epoch
	};
	session.lastReading = enriched;
	return enriched;
}
