import axios, { AxiosInstance } from "axios";
import { SourceRequest } from "./SourceExtractor";

export interface FetchOptions {
    /** Number of connection attempts. */
    attempts: number;
    /** Timeout of a single attempt (in seconds). */
    timeout: number;
}

/** Fetches a response body, or resolves with undefined once every attempt failed. */
export type Fetcher = ( request: SourceRequest ) => Promise<string | undefined>;

export const DEFAULT_FETCH_OPTIONS: FetchOptions = { attempts: 3, timeout: 10 };

/**
 * Map a failed request to the category used in the log.
 */
export function describeRequestError( err: unknown ): string {
    if ( !axios.isAxiosError( err ) ) {
        return "Request Error:";
    }
    if ( err.response ) {
        return "HTTP Error:";
    }
    switch ( err.code ) {
        case "ECONNABORTED":
        case "ETIMEDOUT":
            return "Timeout Error:";
        case "ERR_FR_TOO_MANY_REDIRECTS":
            return "Redirect Error:";
        case "ECONNREFUSED":
        case "ECONNRESET":
        case "ENOTFOUND":
        case "EAI_AGAIN":
        case "ERR_NETWORK":
            return "Connection Error:";
        default:
            return "Request Error:";
    }
}

/**
 * Create a fetcher that tries a GET request up to `attempts` times. Every failed attempt is logged; the
 * fetcher itself never rejects because of the transport.
 */
export function createFetcher(
    options: FetchOptions = DEFAULT_FETCH_OPTIONS,
    client: AxiosInstance = axios.create(),
    logTag = "HTTP"
): Fetcher {
    return async ( request: SourceRequest ) => {
        for ( let attempt = 1; attempt <= options.attempts; attempt++ ) {
            try {
                const response = await client.get<string>( request.url, {
                    params: request.params,
                    headers: request.headers,
                    timeout: options.timeout * 1000,
                    maxRedirects: 10,
                    responseType: "text",
                    transformResponse: ( data: unknown ) => data,
                } );
                return typeof response.data === "string" ? response.data : String( response.data );
            } catch ( err ) {
                const message = err instanceof Error ? err.message : String( err );
                console.warn( `[${ logTag }] ${ describeRequestError( err ) } ${ message } (attempt ${ attempt }/${ options.attempts })` );
            }
        }

        return undefined;
    };
}
