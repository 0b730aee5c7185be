import net from 'net';
import { logger } from '../../utils/logger';
import { AdminError } from '../../utils/errors';
import { AdminEndpoint, describeEndpoint, parseAdminAddress } from '../../utils/addressUtils';
import { RawLinkRecord } from '../peers/types';
import {
  AdminRequest,
  adminEnvelopeSchema,
  describeIssues,
  getSwitchPeersResponseSchema,
} from './schemas';

export interface AdminClientOptions {
  /** Upper bound in ms for connecting, writing the request and receiving the full reply */
  timeout?: number;
  maxResponseBytes?: number;
}

type ParseResult = { complete: true; value: unknown } | { complete: false };

function tryParse(text: string): ParseResult {
  try {
    return { complete: true, value: JSON.parse(text) };
  } catch {
    return { complete: false };
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Client for the node's admin control socket.
 *
 * Each query opens its own stream connection, writes one JSON request and buffers the
 * reply until it forms one complete JSON value or the remote side closes. The socket is
 * destroyed on every exit path.
 */
export class AdminClient {
  private readonly endpoint: AdminEndpoint;
  private readonly timeout: number;
  private readonly maxResponseBytes: number;

  constructor(address: string | AdminEndpoint, options: AdminClientOptions = {}) {
    this.endpoint = typeof address === 'string' ? parseAdminAddress(address) : address;
    this.timeout = options.timeout ?? 5000;
    this.maxResponseBytes = options.maxResponseBytes ?? 4 * 1024 * 1024;
  }

  getEndpoint(): AdminEndpoint {
    return this.endpoint;
  }

  async query(request: AdminRequest): Promise<unknown> {
    let payload: string;
    try {
      payload = JSON.stringify(request);
    } catch (error) {
      throw new AdminError('ENCODE_FAILED', errorMessage(error));
    }

    const target = describeEndpoint(this.endpoint);

    return new Promise<unknown>((resolve, reject) => {
      const chunks: Buffer[] = [];
      let received = 0;
      let connected = false;
      let settled = false;

      const socket =
        this.endpoint.kind === 'unix'
          ? net.createConnection({ path: this.endpoint.path })
          : net.createConnection({ host: this.endpoint.host, port: this.endpoint.port });

      const deadline = setTimeout(() => {
        fail(new AdminError('TIMEOUT', `no complete reply from ${target} within ${this.timeout}ms`));
      }, this.timeout);

      const settle = (): boolean => {
        if (settled) {
          return false;
        }
        settled = true;
        clearTimeout(deadline);
        socket.destroy();
        return true;
      };

      const succeed = (value: unknown): void => {
        if (settle()) {
          logger.debug('Admin socket replied', { target, request: request.request, bytes: received });
          resolve(value);
        }
      };

      function fail(error: AdminError): void {
        if (settle()) {
          logger.warn('Admin socket query failed', {
            target,
            request: request.request,
            code: error.code,
            detail: error.detail,
          });
          reject(error);
        }
      }

      const finishAtClose = (): void => {
        if (received === 0) {
          fail(new AdminError('NO_RESPONSE', `${target} closed the connection without replying`));
          return;
        }
        const parsed = tryParse(Buffer.concat(chunks).toString('utf8'));
        if (parsed.complete) {
          succeed(parsed.value);
        } else {
          fail(new AdminError('INVALID_JSON', `${received} bytes received from ${target} are not valid JSON`));
        }
      };

      socket.on('connect', () => {
        connected = true;
        logger.debug('Connected to admin socket', { target });
        socket.write(payload);
      });

      socket.on('data', (data: Buffer) => {
        chunks.push(data);
        received += data.length;

        if (received > this.maxResponseBytes) {
          fail(
            new AdminError('RESPONSE_TOO_LARGE', `reply exceeded ${this.maxResponseBytes} bytes`)
          );
          return;
        }

        // The socket may stay open after replying, so a reply is complete once it parses
        if (data.toString('utf8').trimEnd().endsWith('}')) {
          const parsed = tryParse(Buffer.concat(chunks).toString('utf8'));
          if (parsed.complete) {
            succeed(parsed.value);
          }
        }
      });

      socket.on('end', finishAtClose);
      socket.on('close', finishAtClose);

      socket.on('error', (error: Error) => {
        const code = !connected ? 'CONNECTION_FAILED' : received === 0 ? 'NO_RESPONSE' : 'INCOMPLETE_RESPONSE';
        fail(new AdminError(code, `${target}: ${error.message} after ${received} bytes`));
      });
    });
  }

  /**
   * Fetch the per-link records of the node's switch, keyed by link id (switch port).
   */
  async getSwitchPeers(): Promise<Record<string, RawLinkRecord>> {
    const reply = await this.query({ request: 'getSwitchPeers' });

    const envelope = adminEnvelopeSchema.safeParse(reply);
    if (!envelope.success) {
      throw new AdminError('MALFORMED_RESPONSE', describeIssues(envelope.error));
    }

    const { status, error, response } = envelope.data;
    if (status !== 'success') {
      const detail =
        typeof error === 'string'
          ? error
          : status === undefined
            ? 'status missing'
            : `status ${JSON.stringify(status)}`;
      throw new AdminError('UNSUCCESSFUL', detail);
    }

    const parsed = getSwitchPeersResponseSchema.safeParse(response);
    if (!parsed.success) {
      throw new AdminError('MALFORMED_RESPONSE', describeIssues(parsed.error, ['response']));
    }

    const links: Record<string, RawLinkRecord> = {};
    for (const [linkId, peer] of Object.entries(parsed.data.switchpeers)) {
      links[linkId] = {
        peerAddress: peer.ip,
        bytesSent: peer.bytes_sent,
        bytesReceived: peer.bytes_recvd,
        coords: peer.coords,
      };
    }
    return links;
  }
}
