import { EventEmitter } from 'events';

export class FakeDescriptor {
  readonly uuid: string;
  private readonly value: Buffer;

  constructor(uuid: string, value: Buffer) {
    this.uuid = uuid;
    this.value = value;
  }

  async readValueAsync() {
    return this.value;
  }
}

export class FakeCharacteristic extends EventEmitter {
  readonly uuid: string;
  value: Buffer;
  readonly descriptors: FakeDescriptor[];
  subscribeError: Error | null = null;

  constructor(uuid: string, bytes: number[], descriptors: FakeDescriptor[] = []) {
    super();
    this.uuid = uuid;
    this.value = Buffer.from(bytes);
    this.descriptors = descriptors;
  }

  async discoverDescriptorsAsync() {
    return this.descriptors;
  }

  // noble reports read results through 'data' as well, flagged as non-notifications.
  async readAsync() {
    this.emit('data', this.value, false);
    return this.value;
  }

  async subscribeAsync() {
    if (this.subscribeError) {
      throw this.subscribeError;
    }
  }

  notify(bytes: number[]) {
    this.value = Buffer.from(bytes);
    this.emit('data', this.value, true);
  }
}

export class FakeService {
  readonly uuid: string;
  readonly characteristics: FakeCharacteristic[];

  constructor(uuid: string, characteristics: FakeCharacteristic[]) {
    this.uuid = uuid;
    this.characteristics = characteristics;
  }

  async discoverCharacteristicsAsync() {
    return this.characteristics;
  }
}

export class FakePeripheral extends EventEmitter {
  readonly id: string;
  readonly address: string;
  readonly advertisement: { localName?: string };
  readonly services: FakeService[];
  state = 'disconnected';
  disconnectCalls = 0;

  constructor(id: string, address: string, localName: string | undefined, services: FakeService[] = []) {
    super();
    this.id = id;
    this.address = address;
    this.advertisement = { localName };
    this.services = services;
  }

  async connectAsync() {
    this.state = 'connected';
  }

  async disconnectAsync() {
    this.disconnectCalls += 1;
    this.state = 'disconnected';
    this.emit('disconnect');
  }

  async discoverServicesAsync() {
    return this.services;
  }

  /** Link loss initiated by the remote side. */
  drop() {
    this.state = 'disconnected';
    this.emit('disconnect');
  }
}

class FakeNoble extends EventEmitter {
  state = 'poweredOn';
  peripherals: FakePeripheral[] = [];
  stopScanCalls = 0;

  async startScanningAsync() {
    this.peripherals.forEach((peripheral) => this.emit('discover', peripheral));
  }

  async stopScanningAsync() {
    this.stopScanCalls += 1;
  }

  reset() {
    this.removeAllListeners();
    this.state = 'poweredOn';
    this.peripherals = [];
    this.stopScanCalls = 0;
  }
}

export const fakeNoble = new FakeNoble();
