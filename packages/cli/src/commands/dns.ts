/**
 * DNS command - ask the operator to create the cluster DNS records
 */
import chalk from 'chalk';
import {
  askToConfigure,
  readDnsEntries,
  ReadlinePrompt,
  SystemResolver,
  TerraformOutputReader,
  validateDnsProvider,
  type HostResolver,
  type InfraOutputReader,
  type OperatorPrompt,
} from 'keelson';
import type { CommandOutput } from './output';

export interface DnsCheckOptions {
  zone: string;
  provider?: string;
  terraformDir?: string;
}

export interface DnsCheckIO {
  reader: InfraOutputReader;
  prompt: OperatorPrompt;
  resolver: HostResolver;
}

export async function checkDns(options: DnsCheckOptions, io: DnsCheckIO, output: CommandOutput): Promise<number> {
  const provider = validateDnsProvider(options.provider ?? 'manual');
  if (provider !== 'manual') {
    output.err(chalk.gray(`DNS records are managed by ${provider}; nothing to configure`));
    return 0;
  }

  const entries = readDnsEntries(io.reader);
  const outcome = await askToConfigure(entries, options.zone, io.prompt, io.resolver);
  if (outcome === 'confirmed') {
    output.err(chalk.green('✓ DNS entries are configured'));
  } else {
    output.err(chalk.yellow('⚠ DNS check skipped'));
  }
  return 0;
}

/** Terminal prompt, system resolver and terraform outputs from `terraformDir`. */
export async function checkDnsInteractive(options: DnsCheckOptions, output: CommandOutput): Promise<number> {
  const prompt = new ReadlinePrompt();
  try {
    return await checkDns(
      options,
      {
        reader: new TerraformOutputReader(options.terraformDir ?? process.cwd()),
        prompt,
        resolver: new SystemResolver(),
      },
      output,
    );
  } finally {
    prompt.close();
  }
}
