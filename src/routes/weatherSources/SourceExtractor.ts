import { DisplayData, SourceId, Station } from "../../types";

/** Everything needed for the GET request of one station. */
export interface SourceRequest {
    url: string;
    params?: Record<string, string>;
    headers?: Record<string, string>;
}

/** Time context for turning normalized data into a display record. */
export interface ExtractionContext {
    /** IANA time zone of the station. Midnight, day dates and years are computed in this zone. */
    timezone: string;
    now: Date;
}

/**
 * The capabilities of one data source. `T` is the normalized form the source's response is reduced to;
 * it is cached between updates and turned into a display record on demand.
 */
export interface SourceExtractor<T> {
    readonly id: SourceId;
    /** Name used in log messages. */
    readonly name: string;

    buildRequest( station: Station ): SourceRequest;

    /**
     * Reduce a response body to normalized data. Returns undefined when the body does not have the expected
     * shape or contains no data.
     */
    extract( body: string, station: Station, context: ExtractionContext ): T | undefined;

    toDisplayData( data: T, station: Station, context: ExtractionContext ): DisplayData;
}

/** Browser user agent for the scraped pages, which reject unknown clients. */
export const BROWSER_USER_AGENT = "Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:109.0) Gecko/20100101 Firefox/114.0";
