import { PassThrough } from 'node:stream';

import { describe, expect, it } from 'vitest';

import { DnsError } from '../src/core/errors';
import { parseDnsEntries, readDnsEntries, validateDnsProvider, type DnsEntry } from '../src/dns/entries';
import {
  askToConfigure,
  CHECK_PROMPT,
  checkDnsEntries,
  formatDnsEntries,
  MISMATCH_MESSAGE,
  nextState,
  type HostResolver,
  type OperatorPrompt,
  ReadlinePrompt,
} from '../src/dns/verify';
import type { InfraOutputReader } from '../src/infra/outputs';

const ENTRIES: DnsEntry[] = [{ name: 'api.example.com', ttl: 300, type: 'A', records: ['1.2.3.4'] }];

class ScriptedPrompt implements OperatorPrompt {
  readonly shown: string[] = [];
  readonly questions: string[] = [];

  constructor(private readonly answers: string[]) {}

  show(text: string): void {
    this.shown.push(text);
  }

  async ask(question: string): Promise<string> {
    this.questions.push(question);
    const answer = this.answers.shift();
    if (answer === undefined) {
      throw new Error('no more answers');
    }
    return answer;
  }
}

function resolverFrom(responses: string[][]): HostResolver & { calls: string[] } {
  const calls: string[] = [];
  return {
    calls,
    async resolve(name: string): Promise<string[]> {
      calls.push(name);
      return responses.shift() ?? [];
    },
  };
}

describe('nextState', () => {
  it('moves through the verification loop on operator input', () => {
    expect(nextState('prompting', { type: 'input', value: '' })).toBe('checking');
    expect(nextState('prompting', { type: 'input', value: 'skip' })).toBe('skipped');
    expect(nextState('prompting', { type: 'input', value: 'yes' })).toBe('prompting');
    expect(nextState('checking', { type: 'checked', matched: true })).toBe('confirmed');
    expect(nextState('checking', { type: 'checked', matched: false })).toBe('prompting');
    expect(nextState('confirmed', { type: 'input', value: '' })).toBe('confirmed');
  });
});

describe('checkDnsEntries', () => {
  it('compares resolved addresses without regard to order', async () => {
    const entries: DnsEntry[] = [{ name: 'a.example.com', ttl: 60, type: 'A', records: ['10.0.0.1', '10.0.0.2'] }];

    await expect(checkDnsEntries(entries, resolverFrom([['10.0.0.2', '10.0.0.1']]))).resolves.toBe(true);
    await expect(checkDnsEntries(entries, resolverFrom([['10.0.0.1']]))).resolves.toBe(false);
  });

  it('treats a failed lookup as a mismatch', async () => {
    const resolver: HostResolver = {
      resolve: async () => {
        throw new Error('ENOTFOUND');
      },
    };

    await expect(checkDnsEntries(ENTRIES, resolver)).resolves.toBe(false);
  });
});

describe('formatDnsEntries', () => {
  it('prints each entry between separators', () => {
    const separator = '-'.repeat(72);

    expect(formatDnsEntries(ENTRIES).split('\n')).toEqual([
      separator,
      'Name: api.example.com',
      'Type: A',
      'Ttl: 300',
      'Records:',
      '- 1.2.3.4',
      separator,
    ]);
  });
});

describe('askToConfigure', () => {
  it('confirms when the records resolve as expected', async () => {
    const prompt = new ScriptedPrompt(['']);
    const resolver = resolverFrom([['1.2.3.4']]);

    await expect(askToConfigure(ENTRIES, 'example.com', prompt, resolver)).resolves.toBe('confirmed');
    expect(prompt.shown[0]).toBe(
      'Please configure the following DNS entries at the DNS provider which hosts "example.com":',
    );
    expect(prompt.questions).toEqual([CHECK_PROMPT]);
    expect(resolver.calls).toEqual(['api.example.com']);
  });

  it('reports a mismatch and prompts again', async () => {
    const prompt = new ScriptedPrompt(['', '']);
    const resolver = resolverFrom([['5.6.7.8'], ['1.2.3.4']]);

    await expect(askToConfigure(ENTRIES, 'example.com', prompt, resolver)).resolves.toBe('confirmed');
    expect(prompt.shown.slice(2)).toEqual([MISMATCH_MESSAGE]);
    expect(prompt.questions).toHaveLength(2);
  });

  it('stops when the operator skips', async () => {
    const prompt = new ScriptedPrompt(['again', 'skip']);
    const resolver = resolverFrom([]);

    await expect(askToConfigure(ENTRIES, 'example.com', prompt, resolver)).resolves.toBe('skipped');
    expect(resolver.calls).toEqual([]);
    expect(prompt.questions).toHaveLength(2);
  });
});

describe('ReadlinePrompt', () => {
  it('answers with the next input line', async () => {
    const input = new PassThrough();
    const prompt = new ReadlinePrompt(input, new PassThrough());

    const answer = prompt.ask(CHECK_PROMPT);
    input.write('skip\n');

    await expect(answer).resolves.toBe('skip');
    prompt.close();
  });

  it('rejects a pending question when the input ends', async () => {
    const input = new PassThrough();
    const prompt = new ReadlinePrompt(input, new PassThrough());

    const outcome = askToConfigure(ENTRIES, 'example.com', prompt, resolverFrom([]));
    input.end();

    await expect(outcome).rejects.toThrow(DnsError);
    await expect(prompt.ask(CHECK_PROMPT)).rejects.toThrow('input closed before the DNS records were confirmed');
    prompt.close();
  });
});

describe('DNS entries', () => {
  it('parses the infrastructure output', () => {
    const reader: InfraOutputReader = {
      readOutput: (name) => {
        expect(name).toBe('dns_entries');
        return JSON.stringify(ENTRIES);
      },
    };

    expect(readDnsEntries(reader)).toEqual(ENTRIES);
  });

  it('wraps reader failures', () => {
    const reader: InfraOutputReader = {
      readOutput: () => {
        throw new Error('no state');
      },
    };

    expect(() => readDnsEntries(reader)).toThrow('failed to get DNS entries: no state');
  });

  it('rejects malformed entries', () => {
    expect(() => parseDnsEntries('{')).toThrow(DnsError);
    expect(() => parseDnsEntries('[{"name":"a","ttl":"300","type":"A","records":[]}]')).toThrow(DnsError);
  });

  it('accepts the supported DNS providers only', () => {
    expect(validateDnsProvider('route53')).toBe('route53');
    expect(() => validateDnsProvider('bind')).toThrow('invalid DNS provider "bind"');
  });
});
