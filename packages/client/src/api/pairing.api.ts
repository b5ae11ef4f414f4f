/**
 * Pairing API Client
 *
 * Typed access to the three account-pairing endpoints. Raw HTTP statuses
 * stop here: callers only ever see the tagged results below.
 *
 * Wire contract (JSON, keys and bundles in standard base64):
 *   POST request   {publicKey}          2xx accepted, 403 rejected
 *   POST wait      {publicKey}          200 {token, secret} approved,
 *                                        200 {state: "requested"} / 202 / 204 pending,
 *                                        403 rejected
 *   POST response  {publicKey, secret}  2xx done, 403 rejected
 */

import type { AxiosInstance, AxiosResponse } from 'axios';
import { base64ToBytes, bytesToBase64 } from '@keybridge/crypto';
import type { PairingConfig } from '../config';
import { PairingError } from '../errors';
import { responseStatus } from './client';

export type PairingRequestResult =
  | { kind: 'accepted' }
  | { kind: 'rejected' }
  | { kind: 'transport-error'; error: unknown };

export type PairingWaitResult =
  | { kind: 'pending' }
  | { kind: 'approved'; token: string; bundle: Uint8Array }
  | { kind: 'rejected' }
  | { kind: 'transport-error'; error: unknown };

export interface PairingApi {
  /** Publish the requester's ephemeral public key (requesting device) */
  requestPairing(publicKey: Uint8Array, signal?: AbortSignal): Promise<PairingRequestResult>;

  /** Ask whether an approving device has answered (requesting device) */
  waitForPairing(publicKey: Uint8Array, signal?: AbortSignal): Promise<PairingWaitResult>;

  /**
   * Deliver the sealed bundle for a requester key (approving device).
   *
   * @throws PairingError 'RESPONSE_REJECTED' on 403, 'RESPONSE_FAILED' otherwise
   */
  respondToPairing(publicKey: Uint8Array, bundle: Uint8Array): Promise<void>;
}

export type PairingPaths = Pick<PairingConfig, 'requestPath' | 'waitPath' | 'responsePath'>;

type PublicKeyBody = { publicKey: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class MalformedResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedResponseError';
  }
}

export class HttpPairingApi implements PairingApi {
  constructor(
    private readonly http: AxiosInstance,
    private readonly paths: PairingPaths
  ) {}

  async requestPairing(publicKey: Uint8Array, signal?: AbortSignal): Promise<PairingRequestResult> {
    try {
      await this.http.post<unknown, AxiosResponse<unknown>, PublicKeyBody>(
        this.paths.requestPath,
        { publicKey: bytesToBase64(publicKey) },
        { signal }
      );
      return { kind: 'accepted' };
    } catch (error) {
      if (responseStatus(error) === 403) {
        return { kind: 'rejected' };
      }
      return { kind: 'transport-error', error };
    }
  }

  async waitForPairing(publicKey: Uint8Array, signal?: AbortSignal): Promise<PairingWaitResult> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.post<unknown, AxiosResponse<unknown>, PublicKeyBody>(
        this.paths.waitPath,
        { publicKey: bytesToBase64(publicKey) },
        { signal }
      );
    } catch (error) {
      if (responseStatus(error) === 403) {
        return { kind: 'rejected' };
      }
      return { kind: 'transport-error', error };
    }

    if (response.status === 202 || response.status === 204) {
      return { kind: 'pending' };
    }

    if (response.status !== 200) {
      return {
        kind: 'transport-error',
        error: new MalformedResponseError(`Unexpected status ${response.status}`),
      };
    }

    return parseWaitBody(response.data);
  }

  async respondToPairing(publicKey: Uint8Array, bundle: Uint8Array): Promise<void> {
    try {
      await this.http.post(this.paths.responsePath, {
        publicKey: bytesToBase64(publicKey),
        secret: bytesToBase64(bundle),
      });
    } catch (error) {
      if (responseStatus(error) === 403) {
        throw new PairingError('Pairing response rejected', 'RESPONSE_REJECTED', { cause: error });
      }
      throw new PairingError('Pairing response failed', 'RESPONSE_FAILED', { cause: error });
    }
  }
}

function isEmptyBody(body: unknown): boolean {
  return body === undefined || body === null || (typeof body === 'string' && body.trim() === '');
}

/**
 * 200 body of the wait endpoint. No body, or one without credentials,
 * is still pending; credentials must be complete to count as approved.
 */
function parseWaitBody(body: unknown): PairingWaitResult {
  if (isEmptyBody(body)) {
    return { kind: 'pending' };
  }

  if (!isRecord(body)) {
    return { kind: 'transport-error', error: new MalformedResponseError('Wait body is not an object') };
  }

  if (body.state === 'requested' || (!('token' in body) && !('secret' in body))) {
    return { kind: 'pending' };
  }

  const { token, secret } = body;
  if (typeof token !== 'string' || token.length === 0 || typeof secret !== 'string') {
    return { kind: 'transport-error', error: new MalformedResponseError('Wait body has no token/secret') };
  }

  try {
    return { kind: 'approved', token, bundle: base64ToBytes(secret) };
  } catch (error) {
    return { kind: 'transport-error', error };
  }
}
