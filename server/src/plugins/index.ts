import { createHomeAssistantPlugin } from './homeassistant';
import { createNetworkPlugins } from './network';
import { createScriptPlugin } from './script';
import { createSystemPlugins } from './system';
import { PluginDescriptor } from './types';

// Plugins shipped with the server
export function builtinPlugins(): PluginDescriptor[] {
  return [
    ...createSystemPlugins(),
    ...createNetworkPlugins(),
    createScriptPlugin(),
    createHomeAssistantPlugin()
  ];
}
