import { ApiError, UNSTRUCTURED_NAME, UNSTRUCTURED_STATUS } from '../error/apiError.js';
import { getServerError, type ServerError } from '../error/serverError.js';
import { FetchClient, type FetchClientOptions } from '../fetch/client.js';
import { mergeHeaderOptions } from '../fetch/utils.js';
import type { JsonValue, RequestPayload } from '../types/json.js';
import type { Config, FetchClientProvider, FetchClientProviderDefinition } from '../types/request.js';
import { constructEndpoint } from '../utils/constructEndpoint.js';
import { parseApiErrorBody } from '../utils/errorBody.js';
import { getResponseData } from '../utils/getResponseData.js';
import { isRecord } from '../utils/isRecord.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from '../utils/wrap.js';

/** Root of the API used when no base URL override is set. */
export const DEFAULT_BASE_URL = 'https://mandrillapp.com/api/1.0/';

/** Body key the credential is sent under. */
export const API_KEY_FIELD = 'key';

/** Configuration for constructing a {@link RequestExecutor}, extends {@link Config}. */
export interface RequestExecutorProps extends Config {
  /** API key injected into every request body. Can also be set later with `configure`. */
  apiKey?: string;
  /** Overrides {@link DEFAULT_BASE_URL}, e.g. to point at a test double. */
  baseUrl?: string;
  /** HTTP transport implementation. Defaults to {@link FetchClient}. */
  fetchProvider?: FetchClientProvider;
}

/**
 * Executes API calls for section clients.
 *
 * Every call is `POST {baseUrl}/{section}/{action}.json` with the payload as a
 * JSON body and the API key injected under `key`. Results come back as
 * error-first tuples:
 * - a 2xx response yields its parsed JSON body, whatever its shape;
 * - a 5xx response yields an {@link ApiError}, built from the server's error
 *   body when it has `message`, `code`, `status` and `name`, synthesized from
 *   the transport error otherwise;
 * - every other failure is returned exactly as the transport produced it.
 *
 * Nothing is retried, cached or logged.
 */
export class RequestExecutor {
  /** HTTP transport constructor. */
  #fetchProvider: FetchClientProvider;
  /** Transport bound to the current base URL, created on first use. */
  #fetchClient: FetchClientProviderDefinition | null = null;
  /** Options handed to the transport. */
  #fetchOpts: FetchClientOptions;
  /** API key injected into request bodies. */
  #apiKey: string | null;
  /** Base URL override, `null` for {@link DEFAULT_BASE_URL}. */
  #baseUrl: string | null;

  /**
   * Creates an executor; nothing is sent until {@link RequestExecutor.execute}.
   *
   * @param props - API key, base URL override, transport and its options.
   */
  constructor({ apiKey, baseUrl, fetchProvider = FetchClient, fetchOpts }: RequestExecutorProps = {}) {
    this.#apiKey = apiKey ?? null;
    this.#baseUrl = baseUrl ?? null;
    this.#fetchProvider = fetchProvider;
    this.#fetchOpts = {
      ...fetchOpts,
      headers: mergeHeaderOptions({ Accept: 'application/json' }, fetchOpts?.headers),
    };
  }

  /** Sets the API key. Its format is not checked; the API decides whether it is valid. */
  configure(apiKey: string) {
    this.#apiKey = apiKey;
  }

  /**
   * Overrides the API root. Not validated. Call before issuing requests; calls
   * already in flight keep the transport they started with.
   */
  setBaseUrl(url: string) {
    this.#baseUrl = url;
    this.#fetchClient = null;
  }

  /** API root requests are currently sent to. */
  get baseUrl(): string {
    return this.#baseUrl ?? DEFAULT_BASE_URL;
  }

  /**
   * Updates transport options (default headers, transport timeout) at runtime.
   */
  config(opts: Config) {
    const { fetchOpts } = opts;
    if (!fetchOpts) {
      return;
    }

    this.#fetchOpts = {
      ...this.#fetchOpts,
      ...fetchOpts,
      headers: mergeHeaderOptions(this.#fetchOpts.headers, fetchOpts.headers),
    };
    this.#fetchClient?.config(this.#fetchOpts);
  }

  /**
   * Sends `payload` to `{section}/{action}.json` and returns the parsed response.
   *
   * The payload is serialized to a plain JSON object before the key is added,
   * so the caller's object is left as it was and a caller-supplied `key` is
   * overwritten in the copy. A payload that serializes to anything but an
   * object is rejected before sending.
   *
   * @typeParam T - Expected response shape; not validated.
   * @param section - Section the action belongs to (lower-cased), e.g. `messages`.
   * @param action - Action within the section, e.g. `send`.
   * @param payload - JSON-serializable request body.
   * @returns A promise resolving to `[error, data]`.
   */
  async execute<T = JsonValue>(section: string, action: string, payload: RequestPayload = {}): SafeWrapAsync<Error, T> {
    const [errEndpoint, endpoint] = constructEndpoint(section, action);
    if (errEndpoint) {
      return [errEndpoint, null];
    }

    if (this.#apiKey === null) {
      return [new Error(`error no api key configured for ${endpoint}`), null];
    }

    // Round-trip first so `toJSON` on the payload cannot replace the injected key
    const [errPlain, plain] = safeWrap<Error, unknown>(() => JSON.parse(JSON.stringify(payload)));
    if (errPlain) {
      return [new Error(`error serializing payload for ${endpoint}`, { cause: errPlain }), null];
    }

    if (!isRecord(plain)) {
      return [new Error(`error serializing payload for ${endpoint}, expected a json object`), null];
    }

    const body = JSON.stringify({ ...plain, [API_KEY_FIELD]: this.#apiKey });

    const transport = this.#transport();
    const [errWrapped, wrapped] = await safeWrapAsync(() =>
      transport.post(endpoint, {
        body,
        headers: { 'Content-Type': 'application/json' },
      }),
    );
    if (errWrapped) {
      return [errWrapped, null];
    }

    const [errReq, response] = wrapped;
    if (errReq) {
      const serverError = getServerError(errReq);
      if (!serverError) {
        return [errReq, null];
      }

      return [await normalizeServerError(serverError), null];
    }

    const [errData, data] = await getResponseData<T>(response);
    if (errData) {
      return [new Error(`error getting response for ${endpoint}`, { cause: errData }), null];
    }

    return [null, data];
  }

  /** Returns the transport for the current base URL, creating it when needed. */
  #transport(): FetchClientProviderDefinition {
    if (!this.#fetchClient) {
      this.#fetchClient = new this.#fetchProvider(this.baseUrl, this.#fetchOpts);
    }

    return this.#fetchClient;
  }
}

/**
 * Turns a server failure into an {@link ApiError}, using the response body when
 * it is a complete API error body and the transport error otherwise.
 */
async function normalizeServerError(serverError: ServerError): Promise<ApiError> {
  const unstructured = () =>
    new ApiError(
      {
        message: serverError.message,
        code: serverError.code,
        status: UNSTRUCTURED_STATUS,
        name: UNSTRUCTURED_NAME,
      },
      'unstructured',
      { cause: serverError },
    );

  const [errText, text] = await safeWrapAsync(() => serverError.response.text());
  if (errText) {
    return unstructured();
  }

  const [errBody, body] = await parseApiErrorBody(text);
  if (errBody) {
    return unstructured();
  }

  return new ApiError(body, 'structured', { cause: serverError });
}
