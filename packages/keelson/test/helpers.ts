import * as path from 'node:path';

import type { ComponentDependencies } from '../src/components/dependencies';
import type { Device, InventoryClient } from '../src/inventory/devices';
import { ChartLoader, type ChartRenderer, type ChartRenderRequest } from '../src/render/charts';
import type { ManifestSet } from '../src/render/manifests';
import type { Settings } from '../src/utils/settings';

export const ASSETS_DIR = path.resolve(__dirname, '..', 'assets');

/** Records every request and returns one manifest per call. */
export class FakeChartRenderer implements ChartRenderer {
  readonly requests: ChartRenderRequest[] = [];
  failure: Error | undefined;

  render(request: ChartRenderRequest): ManifestSet {
    this.requests.push(request);
    if (this.failure) {
      throw this.failure;
    }
    return { [`deployment-${request.releaseName}.yaml`]: `kind: Deployment\nname: ${request.releaseName}\n` };
  }

  lastValues(): Record<string, unknown> {
    const request = this.requests[this.requests.length - 1];
    if (!request) {
      throw new Error('nothing was rendered');
    }
    return request.values;
  }
}

export class FakeInventory implements InventoryClient {
  readonly projects: string[] = [];

  constructor(public devices: Device[] = []) {}

  async listDevices(projectId: string): Promise<Device[]> {
    this.projects.push(projectId);
    return this.devices;
  }
}

export interface TestDependencies extends ComponentDependencies {
  renderer: FakeChartRenderer;
  inventory: FakeInventory;
}

export function testDependencies(overrides: Partial<Settings> = {}): TestDependencies {
  return {
    settings: { packetAuthToken: 'test-token', helmExecutable: 'helm', logLevel: 'silent', ...overrides },
    charts: new ChartLoader(),
    renderer: new FakeChartRenderer(),
    inventory: new FakeInventory([
      { hostname: 'demo-controller-0', facility: 'ams1', userData: 'controller-boot' },
      { hostname: 'demo-pool-1-worker-0', facility: 'ams1', userData: 'worker-boot' },
    ]),
    assetsDir: ASSETS_DIR,
  };
}
