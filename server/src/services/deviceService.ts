import { DeviceModel } from '../config';
import { DeviceNotFoundError, IOError } from '../errors';

export type ImageFormat = 'jpeg' | 'bmp' | 'rgb';
export type Rotation = 0 | 90 | 180 | 270;

// What the renderer needs to know about a panel
export interface DeviceGeometry {
  keyCount: number;
  columns: number;
  rows: number;
  keySize: number;         // Key images are square, in pixels
  imageFormat: ImageFormat;
  rotation: Rotation;      // Applied after drawing, before encoding
  flipHorizontal: boolean;
  flipVertical: boolean;
}

export interface DeviceInfo extends DeviceGeometry {
  model: DeviceModel;
  serial: string;
  firmware: string;
}

// A key changing state; hardware may repeat `pressed: true` while a key is held
export interface KeyEvent {
  slot: number;
  pressed: boolean;
}

// Open connection to one panel. Every method rejects with IOError once the link is gone.
export interface DeviceHandle {
  readonly info: DeviceInfo;
  writeKeyImage(slot: number, data: Buffer): Promise<void>;
  // Resolves with the events seen within timeoutMs, possibly none
  pollEvents(timeoutMs: number): Promise<KeyEvent[]>;
  setBrightness(percent: number): Promise<void>;
  close(): Promise<void>;
}

export interface DeviceDriver {
  // Rejects with DeviceNotFoundError when no panel is attached
  open(): Promise<DeviceHandle>;
}

export const DEVICE_PROFILES: Record<DeviceModel, DeviceGeometry> = {
  mini: { keyCount: 6, columns: 3, rows: 2, keySize: 80, imageFormat: 'bmp', rotation: 90, flipHorizontal: false, flipVertical: false },
  original: { keyCount: 15, columns: 5, rows: 3, keySize: 72, imageFormat: 'bmp', rotation: 0, flipHorizontal: true, flipVertical: true },
  mk2: { keyCount: 15, columns: 5, rows: 3, keySize: 72, imageFormat: 'jpeg', rotation: 0, flipHorizontal: true, flipVertical: true },
  xl: { keyCount: 32, columns: 8, rows: 4, keySize: 96, imageFormat: 'jpeg', rotation: 0, flipHorizontal: true, flipVertical: true },
  neo: { keyCount: 8, columns: 4, rows: 2, keySize: 96, imageFormat: 'jpeg', rotation: 0, flipHorizontal: true, flipVertical: true },
  plus: { keyCount: 8, columns: 4, rows: 2, keySize: 120, imageFormat: 'jpeg', rotation: 0, flipHorizontal: false, flipVertical: false }
};

export function deviceProfile(model: DeviceModel): DeviceGeometry {
  return { ...DEVICE_PROFILES[model] };
}

interface PollWaiter {
  resolve: (events: KeyEvent[]) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

/**
 * In-memory panel. Keeps the last image written to each key and accepts
 * simulated presses, so the editor and the tests can drive the full
 * press → dispatch → repaint loop without hardware.
 *
 * Only one handle is live at a time; opening again closes the previous one.
 */
export class VirtualDeviceDriver implements DeviceDriver {
  readonly info: DeviceInfo;
  brightness: number | null = null;
  openCount = 0;
  private attached = true;
  private images = new Map<number, Buffer>();
  private writes: number[] = [];
  private queue: KeyEvent[] = [];
  private waiter: PollWaiter | null = null;
  private handle: VirtualDeviceHandle | null = null;
  private failAfterWrites: number | null = null;

  constructor(model: DeviceModel = 'mk2', serial = 'VIRTUAL-0001') {
    this.info = { ...deviceProfile(model), model, serial, firmware: 'virtual' };
  }

  async open(): Promise<DeviceHandle> {
    if (!this.attached) {
      throw new DeviceNotFoundError();
    }
    this.handle?.invalidate();
    this.openCount++;
    this.handle = new VirtualDeviceHandle(this);
    return this.handle;
  }

  get isAttached(): boolean {
    return this.attached;
  }

  // Simulate plugging the panel back in
  attach(): void {
    this.attached = true;
  }

  // Simulate unplugging: the live handle fails from now on
  detach(): void {
    this.attached = false;
    this.handle?.invalidate();
    this.handle = null;
    this.rejectWaiter(new IOError('Device disconnected'));
  }

  // Make the write after `successfulWrites` more writes fail once
  injectWriteFailure(successfulWrites = 0): void {
    this.failAfterWrites = successfulWrites;
  }

  press(slot: number): void {
    this.pushEvent({ slot, pressed: true });
  }

  release(slot: number): void {
    this.pushEvent({ slot, pressed: false });
  }

  // Press and release in one go
  tap(slot: number): void {
    this.press(slot);
    this.release(slot);
  }

  getKeyImage(slot: number): Buffer | null {
    return this.images.get(slot) ?? null;
  }

  // Slots written since the last reset, in write order
  writeHistory(): number[] {
    return [...this.writes];
  }

  resetHistory(): void {
    this.writes = [];
  }

  /** @internal */
  storeImage(slot: number, data: Buffer): void {
    if (this.failAfterWrites !== null) {
      if (this.failAfterWrites === 0) {
        this.failAfterWrites = null;
        throw new IOError(`Write to key ${slot} failed`);
      }
      this.failAfterWrites--;
    }
    this.images.set(slot, Buffer.from(data));
    this.writes.push(slot);
  }

  /** @internal */
  takeEvents(timeoutMs: number): Promise<KeyEvent[]> {
    if (this.queue.length > 0) {
      return Promise.resolve(this.queue.splice(0));
    }
    this.resolveWaiter();
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve([]);
      }, timeoutMs);
      this.waiter = { resolve, reject, timer };
    });
  }

  /** @internal */
  resolveWaiter(): void {
    if (!this.waiter) return;
    const { resolve, timer } = this.waiter;
    this.waiter = null;
    clearTimeout(timer);
    resolve(this.queue.splice(0));
  }

  private rejectWaiter(error: Error): void {
    if (!this.waiter) return;
    const { reject, timer } = this.waiter;
    this.waiter = null;
    clearTimeout(timer);
    reject(error);
  }

  private pushEvent(event: KeyEvent): void {
    if (!Number.isInteger(event.slot) || event.slot < 0 || event.slot >= this.info.keyCount) {
      throw new RangeError(`Key ${event.slot} does not exist on a ${this.info.keyCount}-key panel`);
    }
    this.queue.push(event);
    this.resolveWaiter();
  }
}

class VirtualDeviceHandle implements DeviceHandle {
  readonly info: DeviceInfo;
  private live = true;

  constructor(private driver: VirtualDeviceDriver) {
    this.info = { ...driver.info };
  }

  invalidate(): void {
    this.live = false;
  }

  private assertLive(): void {
    if (!this.live) {
      throw new IOError('Device handle is closed');
    }
  }

  async writeKeyImage(slot: number, data: Buffer): Promise<void> {
    this.assertLive();
    if (!Number.isInteger(slot) || slot < 0 || slot >= this.info.keyCount) {
      throw new IOError(`Key ${slot} does not exist`);
    }
    this.driver.storeImage(slot, data);
  }

  async pollEvents(timeoutMs: number): Promise<KeyEvent[]> {
    this.assertLive();
    return this.driver.takeEvents(timeoutMs);
  }

  async setBrightness(percent: number): Promise<void> {
    this.assertLive();
    this.driver.brightness = percent;
  }

  async close(): Promise<void> {
    if (!this.live) return;
    this.live = false;
    this.driver.resolveWaiter();
  }
}

