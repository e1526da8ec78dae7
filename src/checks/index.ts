import type { CheckPlugin } from '../monitor/types.js';
import { electricalPhasesPlugin } from './electrical-phases.js';
import { filesystemPlugin } from './filesystem.js';
import { firewallIfPlugin } from './firewall-if.js';
import { temperaturePlugin } from './temperature.js';

export const builtinPlugins: CheckPlugin[] = [
  temperaturePlugin,
  firewallIfPlugin,
  filesystemPlugin,
  electricalPhasesPlugin,
];

export { electricalPhasesPlugin, filesystemPlugin, firewallIfPlugin, temperaturePlugin };
