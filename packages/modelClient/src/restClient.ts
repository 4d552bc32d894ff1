// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { success, error, Result } from "typechat";
import registerDebug from "debug";

const debugUrl = registerDebug("model-client:rest:url");
const debugHeader = registerDebug("model-client:rest:header");
const debugError = registerDebug("model-client:rest:error");

export type FetchThrottler = (fn: () => Promise<Response>) => Promise<Response>;

export type RetrySettings = {
    retryMaxAttempts?: number | undefined;
    retryPauseMs?: number | undefined;
    timeout?: number | undefined;
    throttler?: FetchThrottler | undefined;
};

/**
 * Call an API using a JSON message body
 * @param headers
 * @param url
 * @param params serialized as the JSON body
 * @param retrySettings
 */
export function callApi(
    headers: Record<string, string>,
    url: string,
    params: object,
    retrySettings?: RetrySettings,
): Promise<Result<Response>> {
    const options: RequestInit = {
        method: "POST",
        body: JSON.stringify(params),
        headers: {
            "content-type": "application/json",
            ...headers,
        },
    };
    return fetchWithRetry(url, options, retrySettings);
}

/**
 * Call a REST API using a JSON message body
 * Returns a Json response
 */
export async function callJsonApi(
    headers: Record<string, string>,
    url: string,
    params: object,
    retrySettings?: RetrySettings,
): Promise<Result<unknown>> {
    const result = await callApi(headers, url, params, retrySettings);
    if (result.success) {
        try {
            const json: unknown = await result.data.json();
            return success(json);
        } catch (e) {
            return error(`callJsonApi(): .json(): ${errorMessage(e)}`);
        }
    }
    return result;
}

/**
 * fetch that automatically retries transient Http errors
 * @param url
 * @param options
 * @param retrySettings maximum attempts (default 3), pause between attempts (default 1000ms), overall timeout (default 1 minute) and optional throttler
 * @returns Response object
 */
export async function fetchWithRetry(
    url: string,
    options?: RequestInit,
    retrySettings?: RetrySettings,
): Promise<Result<Response>> {
    const retryMaxAttempts = retrySettings?.retryMaxAttempts ?? 3;
    const retryPauseMs = retrySettings?.retryPauseMs ?? 1000;
    const timeout = retrySettings?.timeout ?? 60_000;
    const throttler = retrySettings?.throttler;

    const backOffFactor = 3_000;
    let retryCount = 0;
    const startTime: number = Date.now();
    try {
        while (true) {
            const result = await callFetch(url, options, timeout, throttler);
            debugHeader(result.status, result.statusText);
            if (result.status === 200 || result.status === 201) {
                return success(result);
            }
            if (
                !isTransientHttpError(result.status) ||
                retryCount >= retryMaxAttempts ||
                Date.now() - startTime > timeout
            ) {
                return error(
                    `fetch error: ${await getErrorMessage(result, retryCount, Date.now() - startTime)}`,
                );
            } else if (debugError.enabled) {
                debugError(await getErrorMessage(result));
            }

            // Honor Retry-After, plus a back-off that grows with each retry
            const pauseMs = getRetryAfterMs(result, retryPauseMs);
            await sleep(pauseMs + retryCount * backOffFactor);
            retryCount++;
        }
    } catch (e) {
        return error(`fetch error: ${errorMessage(e)}`);
    }
}

/**
 * When servers return a 429, they can include a Retry-After header that says how long the caller
 * should wait before retrying
 * @param result
 * @param defaultValue
 * @returns How many milliseconds to pause before retrying
 */
export function getRetryAfterMs(
    result: Response,
    defaultValue: number,
): number {
    let pauseHeader = result.headers.get("Retry-After");
    if (pauseHeader !== null) {
        pauseHeader = pauseHeader.trim();
        if (pauseHeader) {
            const seconds = parseInt(pauseHeader);
            let pauseMs: number;
            if (isNaN(seconds)) {
                const retryDate = new Date(pauseHeader);
                pauseMs = retryDate.getTime() - Date.now();
            } else {
                pauseMs = seconds * 1000;
            }
            if (pauseMs > 0) {
                return pauseMs;
            }
        }
    }
    return defaultValue;
}

async function callFetch(
    url: string,
    options: RequestInit | undefined,
    timeout: number,
    throttler?: FetchThrottler,
): Promise<Response> {
    return throttler
        ? throttler(() => fetchWithTimeout(url, options, timeout))
        : fetchWithTimeout(url, options, timeout);
}

async function fetchWithTimeout(
    url: string,
    options: RequestInit | undefined,
    timeoutMs: number,
): Promise<Response> {
    debugUrl(url);
    if (timeoutMs <= 0) {
        return fetch(url, options);
    }

    const controller = new AbortController();
    const id = setTimeout(() => controller.abort(), timeoutMs);
    try {
        return await fetch(url, { ...options, signal: controller.signal });
    } catch (e) {
        if (e instanceof Error && e.name === "AbortError") {
            throw new Error(`fetch timeout ${timeoutMs}ms`);
        }
        throw e;
    } finally {
        clearTimeout(id);
    }
}

async function getErrorMessage(
    response: Response,
    retries?: number | undefined,
    timeTaken?: number | undefined,
): Promise<string> {
    const bodyText = await response.text();
    debugError(bodyText);
    const bodyMessage = getBodyErrorMessage(bodyText);
    return `${response.status}: ${response.statusText}${bodyMessage ? `: ${bodyMessage}` : ""}${retries !== undefined ? ` Quitting after ${retries} retries` : ""}${timeTaken !== undefined ? ` in ${timeTaken}ms` : ""}`;
}

function getBodyErrorMessage(bodyText: string): string | undefined {
    let body: unknown;
    try {
        body = JSON.parse(bodyText);
    } catch {
        // Not JSON: report the raw body
        return bodyText || undefined;
    }
    if (typeof body !== "object" || body === null || !("error" in body)) {
        return undefined;
    }
    const bodyError = body.error;
    if (typeof bodyError === "string") {
        return bodyError;
    }
    if (
        typeof bodyError === "object" &&
        bodyError !== null &&
        "message" in bodyError &&
        typeof bodyError.message === "string"
    ) {
        return bodyError.message;
    }
    return JSON.stringify(bodyError);
}

enum HttpStatusCode {
    TooManyRequests = 429,
    InternalServerError = 500,
    BadGateway = 502,
    ServiceUnavailable = 503,
    GatewayTimeout = 504,
}

/**
 * Returns true of the given HTTP status code represents a transient error.
 */
function isTransientHttpError(code: number): boolean {
    switch (code) {
        case HttpStatusCode.TooManyRequests:
        case HttpStatusCode.InternalServerError:
        case HttpStatusCode.BadGateway:
        case HttpStatusCode.ServiceUnavailable:
        case HttpStatusCode.GatewayTimeout:
            return true;
    }
    return false;
}

function errorMessage(e: unknown): string {
    if (e instanceof Error) {
        if (e.cause instanceof Error) {
            return e.cause.message;
        }
        return e.message;
    }
    return String(e);
}

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
