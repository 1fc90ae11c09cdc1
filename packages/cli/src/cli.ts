#!/usr/bin/env node
/**
 * Keelson CLI - validate and render cluster components
 *
 * Commands:
 *   component list      - List registered components
 *   component validate  - Check component configuration
 *   component render    - Render component manifests
 *   dns check           - Ask the operator to configure DNS records
 */
import { Command } from 'commander';
import { builtinRegistry, describeError, loadSettings, setLogLevel } from 'keelson';
import { listComponents, renderComponentManifests, validateComponents, type RenderOptions } from './commands/component';
import { checkDnsInteractive, type DnsCheckOptions } from './commands/dns';
import { consoleOutput } from './commands/output';

async function run(action: () => number | Promise<number>): Promise<void> {
  try {
    process.exitCode = await action();
  } catch (error) {
    console.error(`Error: ${describeError(error)}`);
    process.exitCode = 1;
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('keelson')
    .description('Keelson CLI - configure and render Kubernetes cluster components')
    .version('0.1.0');

  const component = program.command('component').description('Work with cluster components');

  component
    .command('list')
    .description('List registered components')
    .action(() => run(() => listComponents(builtinRegistry(), consoleOutput)));

  component
    .command('validate')
    .description('Validate component configuration')
    .argument('<config>', 'Configuration file')
    .argument('[components...]', 'Components to validate (default: all in the file)')
    .action((config: string, names: string[]) =>
      run(() => validateComponents(builtinRegistry(), config, names, consoleOutput)),
    );

  component
    .command('render')
    .description('Render component manifests')
    .argument('<config>', 'Configuration file')
    .argument('[components...]', 'Components to render (default: all in the file)')
    .option('-o, --output <dir>', 'Write manifests to <dir>/<component>/ instead of stdout')
    .action((config: string, names: string[], opts: RenderOptions) =>
      run(() => renderComponentManifests(builtinRegistry(), config, names, opts, consoleOutput)),
    );

  program
    .command('dns')
    .description('DNS helpers')
    .command('check')
    .description('Show the DNS records to create and check them until they resolve')
    .requiredOption('-z, --zone <zone>', 'DNS zone hosting the cluster records')
    .option('-p, --provider <provider>', 'DNS provider (manual, route53, cloudflare)', 'manual')
    .option('-d, --terraform-dir <dir>', 'Directory holding the infrastructure state')
    .action((opts: DnsCheckOptions) => run(() => checkDnsInteractive(opts, consoleOutput)));

  return program;
}

if (require.main === module) {
  setLogLevel(loadSettings().logLevel);
  createProgram().parseAsync().catch((error: unknown) => {
    console.error(`Error: ${describeError(error)}`);
    process.exitCode = 1;
  });
}
