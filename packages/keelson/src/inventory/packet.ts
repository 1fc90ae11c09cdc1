/**
 * Equinix Metal (formerly Packet) device inventory.
 *
 * @example
 * ```typescript
 * const client = new PacketClient(process.env.PACKET_AUTH_TOKEN);
 * const devices = await client.listDevices('project-id');
 * ```
 */
import * as https from 'node:https';
import { z } from 'zod';
import { describeError, InventoryError } from '../core/errors';
import type { Device, InventoryClient } from './devices';

export const PACKET_API_URL = 'https://api.equinix.com/metal/v1';

const PAGE_SIZE = 100;

/** GET `url` and return the decoded JSON body. */
export type JsonTransport = (url: string, headers: Record<string, string>) => Promise<unknown>;

const devicePageSchema = z.object({
  devices: z.array(
    z.object({
      hostname: z.string(),
      facility: z.object({ code: z.string() }).nullish(),
      userdata: z.string().nullish(),
    }),
  ),
  meta: z
    .object({
      current_page: z.number().optional(),
      last_page: z.number().optional(),
    })
    .optional(),
});

export const httpsJsonTransport: JsonTransport = (url, headers) =>
  new Promise((resolve, reject) => {
    const req = https.request(url, { method: 'GET', headers }, (res) => {
      let body = '';
      res.setEncoding('utf-8');
      res.on('data', (chunk: string) => {
        body += chunk;
      });
      res.on('end', () => {
        const status = res.statusCode ?? 0;
        if (status < 200 || status >= 300) {
          const excerpt = body.length > 1000 ? `${body.substring(0, 1000)}...` : body;
          reject(new InventoryError(`inventory API returned ${status}: ${excerpt}`));
          return;
        }
        try {
          resolve(JSON.parse(body));
        } catch (error) {
          reject(new InventoryError(`failed to parse inventory API response: ${describeError(error)}`, { cause: error }));
        }
      });
    });

    req.on('error', (error) => {
      reject(new InventoryError(`inventory API request failed: ${error.message}`, { cause: error }));
    });
    req.end();
  });

export interface PacketClientOptions {
  baseUrl?: string;
  transport?: JsonTransport;
}

export class PacketClient implements InventoryClient {
  private readonly baseUrl: string;
  private readonly transport: JsonTransport;

  constructor(
    private readonly authToken: string | undefined,
    options: PacketClientOptions = {},
  ) {
    this.baseUrl = (options.baseUrl ?? PACKET_API_URL).replace(/\/+$/, '');
    this.transport = options.transport ?? httpsJsonTransport;
  }

  async listDevices(projectId: string): Promise<Device[]> {
    if (!this.authToken) {
      throw new InventoryError('PACKET_AUTH_TOKEN must be set to list devices');
    }

    const devices: Device[] = [];
    for (let page = 1; ; page++) {
      const url = `${this.baseUrl}/projects/${encodeURIComponent(projectId)}/devices?page=${page}&per_page=${PAGE_SIZE}`;
      const body = await this.transport(url, {
        'X-Auth-Token': this.authToken,
        Accept: 'application/json',
      });

      const parsed = devicePageSchema.safeParse(body);
      if (!parsed.success) {
        throw new InventoryError(`unexpected device listing for project "${projectId}": ${parsed.error.message}`);
      }

      for (const device of parsed.data.devices) {
        devices.push({
          hostname: device.hostname,
          facility: device.facility?.code ?? '',
          userData: device.userdata ?? '',
        });
      }

      const lastPage = parsed.data.meta?.last_page ?? page;
      if (page >= lastPage) {
        return devices;
      }
    }
  }
}
