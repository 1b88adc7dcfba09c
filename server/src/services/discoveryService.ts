import * as os from 'os';
import Bonjour, { Service } from 'bonjour-service';

let bonjour: Bonjour | null = null;
let service: Service | null = null;

// Advertise the web editor as _http._tcp so phones and browsers can find it
export function startAdvertising(port: number, name = `keypanel on ${os.hostname()}`): void {
  if (service) {
    console.log('[Discovery] Already advertising');
    return;
  }

  bonjour = new Bonjour();
  service = bonjour.publish({
    name,
    type: 'http',
    port,
    txt: { path: '/', app: 'keypanel' }
  });
  service.on('error', (error: unknown) => {
    console.error('[Discovery] mDNS advertisement failed:', error);
  });
  console.log(`[Discovery] Advertising "${name}" on port ${port} via mDNS`);
}

// Withdraw the advertisement and release the socket
export function stopAdvertising(): Promise<void> {
  const instance = bonjour;
  if (!instance) return Promise.resolve();

  bonjour = null;
  service = null;
  return new Promise(resolve => {
    instance.unpublishAll(() => {
      instance.destroy();
      console.log('[Discovery] mDNS advertisement stopped');
      resolve();
    });
  });
}
