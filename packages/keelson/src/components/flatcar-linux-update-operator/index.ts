/**
 * FlatcarLinuxUpdateOperator - coordinates node reboots after OS updates.
 *
 * Takes no configuration; renders the manifests shipped under
 * `assets/components/flatcar-linux-update-operator/manifests`.
 */
import * as path from 'node:path';
import { defineSchema } from '../../config/schema';
import { BaseComponent, namespaceLabels, type ComponentMetadata } from '../../core/component';
import { ChartLoadError, inPhase } from '../../core/errors';
import { renderManifestDir } from '../../render/assets';
import type { ManifestSet } from '../../render/manifests';
import type { ComponentDependencies } from '../dependencies';

export const FLATCAR_LINUX_UPDATE_OPERATOR = 'flatcar-linux-update-operator';
export const REBOOT_COORDINATOR_NAMESPACE = 'reboot-coordinator';

export const flatcarLinuxUpdateOperatorSchema = defineSchema({});

export class FlatcarLinuxUpdateOperator extends BaseComponent<typeof flatcarLinuxUpdateOperatorSchema> {
  constructor(private readonly deps: ComponentDependencies) {
    super(FLATCAR_LINUX_UPDATE_OPERATOR, flatcarLinuxUpdateOperatorSchema);
  }

  metadata(): ComponentMetadata {
    return {
      name: this.name,
      namespace: REBOOT_COORDINATOR_NAMESPACE,
      namespaceLabels: namespaceLabels(REBOOT_COORDINATOR_NAMESPACE),
      helm: { releaseName: this.name },
    };
  }

  protected async render(): Promise<ManifestSet> {
    const dir = await inPhase(this.name, 'load-chart', () => {
      if (!this.deps.assetsDir) {
        throw new ChartLoadError('component assets directory was not found');
      }
      return path.join(this.deps.assetsDir, 'components', this.name, 'manifests');
    });

    return inPhase(this.name, 'render', () => renderManifestDir(dir));
  }
}
