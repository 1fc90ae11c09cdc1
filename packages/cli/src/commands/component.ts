/**
 * Component commands - list, validate and render registered components
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import chalk from 'chalk';
import {
  hasErrors,
  loadComponents,
  loadFailed,
  readConfigFile,
  renderComponents,
  type ComponentRegistry,
  type LoadResult,
} from 'keelson';
import { printDiagnostics, type CommandOutput } from './output';

export interface RenderOptions {
  /** Write `<output>/<component>/<file>` instead of printing to stdout. */
  output?: string;
}

export function listComponents(registry: ComponentRegistry, output: CommandOutput): number {
  for (const name of registry.names()) {
    output.out(name);
  }
  return 0;
}

function load(registry: ComponentRegistry, configPath: string, names: string[], output: CommandOutput): LoadResult {
  const file = readConfigFile(configPath);
  const result = loadComponents(registry, file, names.length > 0 ? names : undefined);

  printDiagnostics(output, file.filename, result.diagnostics);
  for (const entry of result.components) {
    printDiagnostics(output, entry.name, entry.diagnostics);
  }
  return result;
}

export function validateComponents(
  registry: ComponentRegistry,
  configPath: string,
  names: string[],
  output: CommandOutput,
): number {
  const result = load(registry, configPath, names, output);
  if (loadFailed(result)) {
    const failed = result.components.filter((entry) => hasErrors(entry.diagnostics)).length;
    output.err(chalk.red(`✖ configuration has errors in ${failed} component(s)`));
    return 1;
  }

  output.err(chalk.green(`✓ ${result.components.length} component(s) valid`));
  return 0;
}

export async function renderComponentManifests(
  registry: ComponentRegistry,
  configPath: string,
  names: string[],
  options: RenderOptions,
  output: CommandOutput,
): Promise<number> {
  const result = load(registry, configPath, names, output);
  if (loadFailed(result)) {
    return 1;
  }

  const rendered = await renderComponents(result.components.map((entry) => entry.component));

  for (const [component, manifests] of rendered) {
    for (const [file, content] of Object.entries(manifests)) {
      if (options.output) {
        const target = path.join(options.output, component, file);
        fs.mkdirSync(path.dirname(target), { recursive: true });
        fs.writeFileSync(target, content);
        output.err(chalk.gray(`   - ${path.relative(options.output, target)}`));
      } else {
        output.out(`---\n# ${component}/${file}\n${content.trimEnd()}`);
      }
    }
  }

  if (options.output) {
    output.err(chalk.green(`✓ rendered ${rendered.size} component(s) to ${options.output}`));
  }
  return 0;
}
