import { z } from 'zod';
import { describeError, DnsError } from '../core/errors';
import type { InfraOutputReader } from '../infra/outputs';

export const DNS_PROVIDERS = ['manual', 'route53', 'cloudflare'] as const;

export type DnsProvider = (typeof DNS_PROVIDERS)[number];

/** Name of the infrastructure output holding the records to configure. */
export const DNS_ENTRIES_OUTPUT = 'dns_entries';

const dnsEntrySchema = z.object({
  name: z.string(),
  ttl: z.number().int(),
  type: z.string(),
  records: z.array(z.string()),
});

export type DnsEntry = z.infer<typeof dnsEntrySchema>;

export function isDnsProvider(value: string): value is DnsProvider {
  return DNS_PROVIDERS.some((provider) => provider === value);
}

export function validateDnsProvider(provider: string): DnsProvider {
  if (!isDnsProvider(provider)) {
    throw new DnsError(`invalid DNS provider "${provider}"`);
  }
  return provider;
}

export function parseDnsEntries(json: string): DnsEntry[] {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new DnsError(`failed to parse DNS entries: ${describeError(error)}`, { cause: error });
  }

  const parsed = z.array(dnsEntrySchema).safeParse(raw);
  if (!parsed.success) {
    throw new DnsError(`failed to parse DNS entries: ${parsed.error.message}`);
  }
  return parsed.data;
}

export function readDnsEntries(reader: InfraOutputReader): DnsEntry[] {
  let output: string;
  try {
    output = reader.readOutput(DNS_ENTRIES_OUTPUT);
  } catch (error) {
    throw new DnsError(`failed to get DNS entries: ${describeError(error)}`, { cause: error });
  }
  return parseDnsEntries(output);
}
