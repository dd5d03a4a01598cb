/**
 * Socket.io transport for the Uptime Kuma management API
 *
 * Uptime Kuma has no REST API for monitor and tag management; the web UI
 * talks to the server over Socket.io events with acknowledgement callbacks.
 * This module narrows socket.io-client to the two primitives the client
 * needs: request/ack with a timeout, and subscriptions to pushed events.
 */

import { io, type Socket } from 'socket.io-client';
import type { ApiLogger } from './logger.js';

/**
 * Minimal event transport used by the Uptime Kuma client
 */
export interface KumaTransport {
  /** Emit an event and resolve with the server's acknowledgement */
  request(event: string, ...args: unknown[]): Promise<unknown>;
  /** Listen for a server-pushed event; returns an unsubscribe function */
  subscribe(event: string, listener: (payload: unknown) => void): () => void;
  /** Disconnect */
  close(): void;
}

export interface TransportOptions {
  /** Timeout for connecting and for every acknowledgement (ms) */
  timeoutMs: number;
  /** Verify the server's TLS certificate */
  verifyTls: boolean;
  logger: ApiLogger;
}

/**
 * Wrap a connected socket as a KumaTransport
 */
export function socketTransport(socket: Socket, timeoutMs: number, log: ApiLogger): KumaTransport {
  return {
    async request(event: string, ...args: unknown[]): Promise<unknown> {
      log.debug('Socket request', { event });
      const startTime = Date.now();
      const response: unknown = await socket.timeout(timeoutMs).emitWithAck(event, ...args);
      log.debug('Socket response', { event, durationMs: Date.now() - startTime });
      return response;
    },

    subscribe(event: string, listener: (payload: unknown) => void): () => void {
      const handler = (payload: unknown): void => listener(payload);
      socket.on(event, handler);
      return () => {
        socket.off(event, handler);
      };
    },

    close(): void {
      socket.disconnect();
    },
  };
}

/**
 * Connect to an Uptime Kuma server
 *
 * Reconnection is disabled: a lost connection fails the current request and
 * the next scheduled run starts over.
 */
export function connectTransport(baseUrl: string, options: TransportOptions): Promise<KumaTransport> {
  const { timeoutMs, verifyTls, logger: log } = options;

  return new Promise((resolve, reject) => {
    const socket = io(baseUrl, {
      reconnection: false,
      timeout: timeoutMs,
      rejectUnauthorized: verifyTls,
    });

    const cleanup = (): void => {
      socket.off('connect', onConnect);
      socket.off('connect_error', onError);
    };

    const onConnect = (): void => {
      cleanup();
      log.debug('Connected to Uptime Kuma', { baseUrl });
      resolve(socketTransport(socket, timeoutMs, log));
    };

    const onError = (err: Error): void => {
      cleanup();
      socket.disconnect();
      reject(err);
    };

    socket.on('connect', onConnect);
    socket.on('connect_error', onError);

    socket.on('disconnect', (reason) => {
      log.debug('Disconnected from Uptime Kuma', { reason });
    });
  });
}
