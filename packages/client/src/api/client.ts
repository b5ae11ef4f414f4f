import axios, { type AxiosInstance } from 'axios';
import type { ClientConfig } from '../config';

/** Returns the current access token, or null while signed out */
export type AccessTokenProvider = () => string | null | undefined;

/**
 * Create the HTTP client for the account server.
 *
 * There is no module-level instance: each account session owns its client,
 * and the token comes from whatever the caller's session holds right now.
 */
export function createApiClient(
  config: Pick<ClientConfig, 'serverUrl' | 'requestTimeoutMs'>,
  getAccessToken?: AccessTokenProvider
): AxiosInstance {
  const apiClient = axios.create({
    baseURL: config.serverUrl,
    timeout: config.requestTimeoutMs,
    headers: { 'Content-Type': 'application/json' },
  });

  // Request interceptor: Add access token to headers
  apiClient.interceptors.request.use((request) => {
    const accessToken = getAccessToken?.();
    if (accessToken) {
      request.headers.Authorization = `Bearer ${accessToken}`;
    }
    return request;
  });

  return apiClient;
}

/**
 * HTTP status of a failed axios call, if the server answered at all.
 */
export function responseStatus(error: unknown): number | undefined {
  return axios.isAxiosError(error) ? error.response?.status : undefined;
}
