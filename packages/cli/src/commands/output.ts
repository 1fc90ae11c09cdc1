import chalk from 'chalk';
import { formatDiagnostic, type Diagnostic } from 'keelson';

/** Where command output goes; stdout carries results, stderr everything else. */
export interface CommandOutput {
  out(text: string): void;
  err(text: string): void;
}

export const consoleOutput: CommandOutput = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
};

export function printDiagnostics(output: CommandOutput, component: string, diagnostics: readonly Diagnostic[]): void {
  if (diagnostics.length === 0) {
    return;
  }
  output.err(chalk.bold(`${component}:`));
  for (const diagnostic of diagnostics) {
    const text = `  ${formatDiagnostic(diagnostic)}`;
    output.err(diagnostic.severity === 'error' ? chalk.red(text) : chalk.yellow(text));
  }
}
