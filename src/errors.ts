export enum ErrorCode {
	/** An environment variable or option held a value that cannot be used. */
	InvalidConfiguration = 1,
	/** A function was called with an argument outside its contract. */
	InvalidArgument = 2,
	/** No normalizer or station provider is registered for the requested provider ID. */
	UnknownProvider = 3,
	/** A station inventory file could not be read or had an unexpected shape. */
	StationInventoryUnavailable = 4
}

/**
 * An error for programmer mistakes and malformed configuration. Data-quality problems are never reported this way;
 * they turn into NaN values instead.
 */
export class CodedError extends Error {
	public readonly errCode: ErrorCode;

	public constructor( errCode: ErrorCode, message?: string ) {
		super( message ?? ErrorCode[ errCode ] );
		this.name = "CodedError";
		this.errCode = errCode;
	}
}

/** Returns a short, loggable description of any thrown value. */
export function describeError( err: unknown ): string {
	if ( err instanceof CodedError ) {
		return `${ ErrorCode[ err.errCode ] }: ${ err.message }`;
	}
	if ( err instanceof Error ) {
		return err.message;
	}
	return String( err );
}
