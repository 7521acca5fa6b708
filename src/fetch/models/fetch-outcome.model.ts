// Field names follow the JSON wire format of POST /fetch.

export interface FetchOutcome {
    url: string;
    ok: boolean;
    status_code: number | null;
    charset: string | null;
    content: string | null;
    error: string | null;
    bytes_downloaded: number | null;
    elapsed_ms: number;
}

export interface BatchResult {
    total: number;
    concurrency: number;
    elapsed_ms: number;
    results: FetchOutcome[];
}

/** Request after defaults are applied and bounds checked. */
export interface ResolvedFetchRequest {
    readonly urls: readonly string[];
    readonly timeoutMs: number;
    readonly concurrency: number;
    readonly toMarkdown: boolean;
}

export type TaskState =
    | 'pending'
    | 'fetching'
    | 'fetched'
    | 'fetch-failed'
    | 'fetched-non-2xx'
    | 'extracting'
    | 'done'
    | 'extract-failed';

export type TerminalTaskState = Extract<
    TaskState,
    'done' | 'fetch-failed' | 'fetched-non-2xx' | 'extract-failed'
>;
