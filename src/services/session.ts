import { DEFAULT_MAX_SESSIONS, DEFAULT_SESSION_IDLE_MINUTES, PRESSURE_HISTORY_CAPACITY } from "../config";
import { DailyExtremesState, createDailyExtremes } from "./extremes";
import { PressureHistoryState, createPressureHistory } from "./pressure";
import { RainHistoryState, createRainHistory } from "./rain";
import type { EnrichedReading } from "./enrichment";

/**
 * The state one client accumulates while it feeds readings in. Histories are created on first use and are never
 * shared with other sessions.
 */
export class WeatherSession {
	private rainState: RainHistoryState | undefined;
	private pressureState: PressureHistoryState | undefined;
	private extremesState: DailyExtremesState | undefined;

	/** The most recent result of enrichReading for this session. */
	public lastReading: EnrichedReading | undefined;

	public constructor( public readonly id: string ) {}

	public get rain(): RainHistoryState {
		if ( !this.rainState ) {
			this.rainState = createRainHistory();
		}
		return this.rainState;
	}

	public get pressure(): PressureHistoryState {
		if ( !this.pressureState ) {
			this.pressureState = createPressureHistory( PRESSURE_HISTORY_CAPACITY );
		}
		return this.pressureState;
	}

	/**
	 * The daily extremes, counted in calendar days of `timezone`. A change of time zone (another station) starts over.
	 */
	public extremes( timezone: string ): DailyExtremesState {
		if ( !this.extremesState || this.extremesState.timezone !== timezone ) {
			this.extremesState = createDailyExtremes( timezone );
		}
		return this.extremesState;
	}

	/** The extremes state as it is, without creating one. */
	public get currentExtremes(): DailyExtremesState | undefined {
		return this.extremesState;
	}

	public clear(): void {
		this.rainState = undefined;
		this.pressureState = undefined;
		this.extremesState = undefined;
		this.lastReading = undefined;
	}
}

export interface SessionStoreOptions {
	/** Sessions without use for this many minutes are dropped. */
	idleMinutes?: number;
	/** Upper bound on live sessions; the least recently used one is dropped first. */
	maxSessions?: number;
	/** Wall-clock Unix epoch seconds. */
	clock?: () => number;
}

interface SessionEntry {
	session: WeatherSession;
	lastUsed: number;
}

/**
 * Sessions by client-chosen ID. Entries are kept in order of last use, so the first one is the least recently used.
 */
export class SessionStore {
	private readonly sessions = new Map<string, SessionEntry>();
	private readonly idleSeconds: number;
	private readonly maxSessions: number;
	private readonly clock: () => number;

	public constructor( options: SessionStoreOptions = {} ) {
		this.idleSeconds = ( options.idleMinutes ?? DEFAULT_SESSION_IDLE_MINUTES ) * 60;
		this.maxSessions = options.maxSessions ?? DEFAULT_MAX_SESSIONS;
		this.clock = options.clock ?? ( () => Date.now() / 1000 );
	}

	/** Returns the session with the given ID, creating it if needed, and marks it as used. */
	public get( id: string ): WeatherSession {
		const now = this.clock();
		this.dropIdle( now );

		let entry = this.sessions.get( id );
		if ( entry ) {
			this.sessions.delete( id );
		} else {
			entry = { session: new WeatherSession( id ), lastUsed: now };
			console.log( `[Sessions] Created session "${ id }"` );
		}
		entry.lastUsed = now;
		this.sessions.set( id, entry );

		for ( const oldest of this.sessions.keys() ) {
			if ( this.sessions.size <= this.maxSessions ) {
				break;
			}
			this.drop( oldest, "session limit reached" );
		}
		return entry.session;
	}

	public has( id: string ): boolean {
		const entry = this.sessions.get( id );
		return entry !== undefined && !this.isIdle( entry, this.clock() );
	}

	/** Clears and forgets a session. @return Whether the session existed. */
	public delete( id: string ): boolean {
		const entry = this.sessions.get( id );
		entry?.session.clear();
		return this.sessions.delete( id );
	}

	public get size(): number {
		return this.sessions.size;
	}

	private isIdle( entry: SessionEntry, now: number ): boolean {
		return now - entry.lastUsed > this.idleSeconds;
	}

	private dropIdle( now: number ): void {
		for ( const [ id, entry ] of this.sessions ) {
			if ( this.isIdle( entry, now ) ) {
				this.drop( id, "idle" );
			}
		}
	}

	private drop( id: string, reason: string ): void {
		this.delete( id );
		console.log( `[Sessions] Dropped session "${ id }" (${ reason })` );
	}
}
