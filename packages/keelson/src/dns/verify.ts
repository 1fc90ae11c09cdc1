/**
 * Operator-paced DNS verification.
 *
 * The operator is shown the records to create, then each input line drives
 * the loop: an empty line checks live DNS, `skip` ends the loop, anything
 * else asks again. There is no timeout.
 */
import * as dns from 'node:dns/promises';
import * as readline from 'node:readline';
import { describeError, DnsError } from '../core/errors';
import { createLogger } from '../utils/logger';
import type { DnsEntry } from './entries';

export type DnsCheckState = 'prompting' | 'checking' | 'confirmed' | 'skipped';

export type DnsCheckEvent =
  | { type: 'input'; value: string }
  | { type: 'checked'; matched: boolean };

export type DnsCheckOutcome = Extract<DnsCheckState, 'confirmed' | 'skipped'>;

export interface OperatorPrompt {
  show(text: string): void;
  ask(question: string): Promise<string>;
}

export interface HostResolver {
  /** Every address `name` resolves to. */
  resolve(name: string): Promise<string[]>;
}

export const CHECK_PROMPT = 'Press Enter to check the entries or type "skip" to continue the installation: ';
export const MISMATCH_MESSAGE = 'Entries are not correctly configured, please verify.';

const SKIP = 'skip';
const SEPARATOR = '-'.repeat(72);

const log = createLogger('dns');

/** Transition table of the verification loop. Unexpected events leave the state as it is. */
export function nextState(state: DnsCheckState, event: DnsCheckEvent): DnsCheckState {
  switch (state) {
    case 'prompting':
      if (event.type !== 'input') {
        return state;
      }
      if (event.value === SKIP) {
        return 'skipped';
      }
      return event.value === '' ? 'checking' : 'prompting';
    case 'checking':
      if (event.type !== 'checked') {
        return state;
      }
      return event.matched ? 'confirmed' : 'prompting';
    case 'confirmed':
    case 'skipped':
      return state;
  }
}

export function formatDnsEntries(entries: readonly DnsEntry[]): string {
  const lines = [SEPARATOR];
  for (const entry of entries) {
    lines.push(`Name: ${entry.name}`, `Type: ${entry.type}`, `Ttl: ${entry.ttl}`, 'Records:');
    lines.push(...entry.records.map((record) => `- ${record}`));
    lines.push(SEPARATOR);
  }
  return lines.join('\n');
}

function sameValues(a: readonly string[], b: readonly string[]): boolean {
  const left = [...a].sort();
  const right = [...b].sort();
  return left.length === right.length && left.every((value, i) => value === right[i]);
}

/** True when every entry resolves to exactly its records, in any order. */
export async function checkDnsEntries(entries: readonly DnsEntry[], resolver: HostResolver): Promise<boolean> {
  for (const entry of entries) {
    let addresses: string[];
    try {
      addresses = await resolver.resolve(entry.name);
    } catch (error) {
      log.debug(`lookup of ${entry.name} failed: ${describeError(error)}`);
      return false;
    }

    if (!sameValues(addresses, entry.records)) {
      log.debug(`${entry.name} resolves to [${addresses.join(', ')}], want [${entry.records.join(', ')}]`);
      return false;
    }
  }
  return true;
}

export async function askToConfigure(
  entries: readonly DnsEntry[],
  zone: string,
  prompt: OperatorPrompt,
  resolver: HostResolver,
): Promise<DnsCheckOutcome> {
  prompt.show(`Please configure the following DNS entries at the DNS provider which hosts "${zone}":`);
  prompt.show(formatDnsEntries(entries));

  let state: DnsCheckState = 'prompting';
  for (;;) {
    switch (state) {
      case 'prompting': {
        const input = (await prompt.ask(CHECK_PROMPT)).trim();
        state = nextState(state, { type: 'input', value: input });
        break;
      }
      case 'checking': {
        const matched = await checkDnsEntries(entries, resolver);
        if (!matched) {
          prompt.show(MISMATCH_MESSAGE);
        }
        state = nextState(state, { type: 'checked', matched });
        break;
      }
      case 'confirmed':
      case 'skipped':
        return state;
    }
  }
}

/** Resolves names through the system resolver, all address families. */
export class SystemResolver implements HostResolver {
  async resolve(name: string): Promise<string[]> {
    const addresses = await dns.lookup(name, { all: true });
    return addresses.map((entry) => entry.address);
  }
}

/**
 * Prompts on the terminal. Call close() once done.
 *
 * When the input ends before an answer arrives, the pending question rejects
 * with a DnsError and later questions reject straight away.
 */
export class ReadlinePrompt implements OperatorPrompt {
  private readonly rl: readline.Interface;
  private closed = false;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout,
  ) {
    this.rl = readline.createInterface({ input, output });
    this.rl.once('close', () => {
      this.closed = true;
    });
  }

  show(text: string): void {
    this.output.write(`${text}\n`);
  }

  ask(question: string): Promise<string> {
    return new Promise((resolve, reject) => {
      if (this.closed) {
        reject(new DnsError('input closed before the DNS records were confirmed'));
        return;
      }
      const onClose = (): void => {
        reject(new DnsError('input closed before the DNS records were confirmed'));
      };
      this.rl.once('close', onClose);
      this.rl.question(question, (answer) => {
        this.rl.off('close', onClose);
        resolve(answer);
      });
    });
  }

  close(): void {
    if (!this.closed) {
      this.rl.close();
    }
  }
}
