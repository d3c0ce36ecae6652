export enum ErrorCode {
	/** A source name that is not "dwd", "w24" or "won" was requested. */
	UnknownSource = 1,
	/** The station directory does not contain the requested station. */
	StationNotFound = 2,
	/** A table cell or value could not be converted to a number or date. */
	MalformedValue = 10,
	/** A configuration file or option is unusable. */
	InvalidConfiguration = 20,
}

/** An error with a numeric code that callers can switch on. */
export class CodedError extends Error {
	public readonly errCode: ErrorCode;

	public constructor( errCode: ErrorCode, message?: string ) {
		super( message ?? ErrorCode[ errCode ] );
		this.name = "CodedError";
		this.errCode = errCode;
	}
}
