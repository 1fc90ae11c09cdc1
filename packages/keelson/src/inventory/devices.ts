import { DuplicateDeviceError, WorkerNotFoundError } from '../core/errors';

/** A machine in the inventory of a project. */
export interface Device {
  hostname: string;
  /** Facility (location) code, e.g. `ams1`. */
  facility: string;
  /** Opaque boot payload the machine was provisioned with. */
  userData: string;
}

export interface InventoryClient {
  listDevices(projectId: string): Promise<Device[]>;
}

const WORKER_MARKER = 'worker';

/**
 * Find the boot payload of a worker of `clusterName` in `facility`.
 *
 * Hostnames must be unique within the facility; a repeated hostname is
 * ambiguous and fails before anything is selected. The selected device's
 * hostname contains both the cluster name and "worker"; when several do,
 * the last one listed wins. The payload is returned base64-encoded.
 */
export function findWorkerUserData(clusterName: string, facility: string, devices: readonly Device[]): string {
  const seen = new Set<string>();
  let selected: Device | undefined;

  for (const device of devices) {
    if (device.facility !== facility) {
      continue;
    }
    if (seen.has(device.hostname)) {
      throw new DuplicateDeviceError(device.hostname, facility);
    }
    seen.add(device.hostname);

    if (device.hostname.includes(clusterName) && device.hostname.includes(WORKER_MARKER)) {
      selected = device;
    }
  }

  // Workers without user data do not count.
  if (!selected || selected.userData === '') {
    throw new WorkerNotFoundError(clusterName);
  }
  return Buffer.from(selected.userData, 'utf-8').toString('base64');
}
