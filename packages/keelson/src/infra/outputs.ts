import { spawnSync } from 'node:child_process';
import { OutputReadError } from '../core/errors';

/** Read-only access to the outputs of the infrastructure provisioning phase. */
export interface InfraOutputReader {
  /** JSON text of the output called `name`. */
  readOutput(name: string): string;
}

/**
 * Reads outputs with `terraform output -json <name>` from an initialized
 * working directory.
 */
export class TerraformOutputReader implements InfraOutputReader {
  constructor(
    private readonly workingDir: string,
    private readonly executable = 'terraform',
  ) {}

  readOutput(name: string): string {
    const result = spawnSync(this.executable, ['output', '-json', name], {
      cwd: this.workingDir,
      encoding: 'utf8',
    });

    if (result.error) {
      throw new OutputReadError(`failed to run ${this.executable}: ${result.error.message}`, { cause: result.error });
    }
    if (result.status !== 0) {
      const stderr = result.stderr?.trim() ?? '';
      throw new OutputReadError(`failed to read output "${name}": ${stderr || `exit status ${result.status}`}`);
    }
    return result.stdout;
  }
}
