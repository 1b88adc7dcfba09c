import { PluginDescriptor, stringSetting } from '../types';

// Subset of fetch the plugin needs, so tests can pass a stand-in
export type FetchLike = (url: string, init: RequestInit) => Promise<Pick<Response, 'ok' | 'status' | 'statusText'>>;

// Normalize the base URL (remove trailing slashes)
function getBaseUrl(url: string): string {
  return url.replace(/\/+$/, '');
}

export function createHomeAssistantPlugin(fetchImpl: FetchLike = fetch): PluginDescriptor {
  return {
    id: 'homeassistant.control',
    name: 'Home Assistant',
    description: 'Call a Home Assistant service for an entity',
    category: 'iot',
    icon: 'home',
    configSchema: {
      type: 'object',
      properties: {
        url: { type: 'string', pattern: '^https?://', description: 'Home Assistant URL (e.g., http://homeassistant.local:8123)' },
        token: { type: 'string', minLength: 1, description: 'Long-lived access token' },
        domain: { type: 'string', pattern: '^[a-z_]+$', description: 'Service domain (e.g., light, switch)' },
        service: { type: 'string', pattern: '^[a-z_]+$', description: 'Service name (e.g., turn_on, toggle)' },
        entity_id: { type: 'string', pattern: '^[a-z_]+\\.[a-z0-9_]+$', description: 'Entity ID (e.g., light.living_room)' }
      },
      required: ['url', 'token', 'domain', 'service', 'entity_id']
    },
    async execute(context, config) {
      const domain = stringSetting(config, 'domain');
      const service = stringSetting(config, 'service');
      const entityId = stringSetting(config, 'entity_id');
      const apiUrl = `${getBaseUrl(stringSetting(config, 'url'))}/api/services/${domain}/${service}`;

      console.log(`[Plugins] Calling Home Assistant: ${domain}.${service} for ${entityId}`);
      const response = await fetchImpl(apiUrl, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${stringSetting(config, 'token')}`,
          'Content-Type': 'application/json'
        },
        body: JSON.stringify({ entity_id: entityId }),
        signal: context.signal
      });

      if (!response.ok) {
        return { success: false, message: `HTTP ${response.status}: ${response.statusText}` };
      }
      return { success: true, message: `${domain}.${service} ${entityId}` };
    }
  };
}
