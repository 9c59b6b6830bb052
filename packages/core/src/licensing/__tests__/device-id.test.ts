import { describe, it, expect } from 'vitest';
import { DEVICE_ID_LENGTH, currentDeviceId, deriveDeviceId } from '../device-id.js';

const SIGNALS = { machineId: 'machine-0001', hostname: 'build-host', username: 'tester' };

describe('deriveDeviceId', () => {
  it('should hash the signals into a fixed-length hex id', () => {
    expect(deriveDeviceId(SIGNALS)).toBe('4deb53f8d97b0ee927e700654b38bf57');
  });

  it('should ignore surrounding whitespace', () => {
    expect(deriveDeviceId({ machineId: 'machine-0001\n', hostname: ' build-host', username: 'tester ' })).toBe(
      deriveDeviceId(SIGNALS)
    );
  });

  it('should substitute a marker when the machine id is unknown', () => {
    expect(deriveDeviceId({ ...SIGNALS, machineId: null })).toBe('cd17a8506a9b81b9c68ca1bcdf93aa6c');
  });

  it('should change with any signal', () => {
    const base = deriveDeviceId(SIGNALS);
    expect(deriveDeviceId({ ...SIGNALS, hostname: 'other-host' })).not.toBe(base);
    expect(deriveDeviceId({ ...SIGNALS, username: 'other' })).not.toBe(base);
  });
});

describe('currentDeviceId', () => {
  it('should be stable for this machine', () => {
    const id = currentDeviceId();
    expect(id).toMatch(new RegExp(`^[0-9a-f]{${DEVICE_ID_LENGTH}}$`));
    expect(currentDeviceId()).toBe(id);
  });
});
