import { PacketClient } from '../inventory/packet';
import type { InventoryClient } from '../inventory/devices';
import { findAssetsDir } from '../render/assets';
import { ChartLoader, HelmChartRenderer, type ChartRenderer } from '../render/charts';
import { loadSettings, type Settings } from '../utils/settings';

/** Collaborators the built-in components render against. */
export interface ComponentDependencies {
  settings: Settings;
  charts: ChartLoader;
  renderer: ChartRenderer;
  inventory: InventoryClient;
  /** Root of the packaged manifest assets; `undefined` when none were found. */
  assetsDir?: string;
}

export function defaultDependencies(settings: Settings = loadSettings()): ComponentDependencies {
  const assetsDir = findAssetsDir();
  return {
    settings,
    charts: new ChartLoader(settings.chartsDir),
    renderer: new HelmChartRenderer(settings.helmExecutable),
    inventory: new PacketClient(settings.packetAuthToken),
    ...(assetsDir ? { assetsDir } : {}),
  };
}
