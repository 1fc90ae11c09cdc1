/**
 * Process settings read from the environment.
 *
 * @example
 * ```bash
 * PACKET_AUTH_TOKEN=... KEELSON_CHARTS_DIR=./charts keelson component render cluster.yaml
 * ```
 */
import { isLogLevel, type LogLevel } from './logger';

export interface Settings {
  /** Equinix Metal (Packet) API token, used by the cluster autoscaler. */
  packetAuthToken?: string;
  /** Directory holding local charts as `<dir>/<component>/Chart.yaml`. */
  chartsDir?: string;
  /** Helm binary used to template charts (defaults to `helm`). */
  helmExecutable: string;
  logLevel: LogLevel;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const level = env['KEELSON_LOG_LEVEL']?.toLowerCase();
  const token = env['PACKET_AUTH_TOKEN'];
  const chartsDir = env['KEELSON_CHARTS_DIR'];

  return {
    ...(token ? { packetAuthToken: token } : {}),
    ...(chartsDir ? { chartsDir } : {}),
    helmExecutable: env['KEELSON_HELM'] || 'helm',
    logLevel: level && isLogLevel(level) ? level : 'info',
  };
}
