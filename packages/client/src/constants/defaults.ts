// HTTP GENERATION PROVIDER //

/** base url of the local model server */
export const DEFAULT_GENERATION_BASE_URL = 'http://127.0.0.1:8080';
/** path of the openai-compatible chat completions endpoint */
export const DEFAULT_GENERATION_PATH = '/v1/chat/completions';
/** model requested when the caller names none */
export const DEFAULT_GENERATION_MODEL = 'local-llm';
/** sampling temperature sent with every completion */
export const DEFAULT_GENERATION_TEMPERATURE = 0.7;
/** token bound used when the request carries none */
export const DEFAULT_GENERATION_MAX_TOKENS = 512;
/** time allowed for one completion in milliseconds */
export const DEFAULT_GENERATION_TIMEOUT_MS = 60_000;

// DELEGATION //

/** label prefixed to the text of a generation that failed */
export const SAMPLING_ERROR_PREFIX = '[sampling error]';
