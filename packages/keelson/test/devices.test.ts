import { describe, expect, it } from 'vitest';

import { DuplicateDeviceError, WorkerNotFoundError } from '../src/core/errors';
import { findWorkerUserData, type Device } from '../src/inventory/devices';

const base64 = (text: string): string => Buffer.from(text, 'utf-8').toString('base64');

describe('findWorkerUserData', () => {
  it('returns the base64 payload of the matching worker', () => {
    const devices: Device[] = [
      { hostname: 'demo-controller-0', facility: 'ams1', userData: 'controller' },
      { hostname: 'demo-pool-1-worker-0', facility: 'ams1', userData: 'worker' },
      { hostname: 'other-pool-1-worker-0', facility: 'ams1', userData: 'other' },
    ];

    expect(findWorkerUserData('demo', 'ams1', devices)).toBe(base64('worker'));
  });

  it('ignores devices in other facilities', () => {
    const devices: Device[] = [
      { hostname: 'demo-worker-0', facility: 'sjc1', userData: 'far' },
      { hostname: 'demo-worker-0', facility: 'ams1', userData: 'near' },
    ];

    expect(findWorkerUserData('demo', 'ams1', devices)).toBe(base64('near'));
  });

  it('takes the last matching worker', () => {
    const devices: Device[] = [
      { hostname: 'demo-worker-0', facility: 'ams1', userData: 'first' },
      { hostname: 'demo-worker-1', facility: 'ams1', userData: 'second' },
    ];

    expect(findWorkerUserData('demo', 'ams1', devices)).toBe(base64('second'));
  });

  it('fails on two devices with the same hostname in the facility', () => {
    const devices: Device[] = [
      { hostname: 'a', facility: 'ams1', userData: '' },
      { hostname: 'a', facility: 'ams1', userData: '' },
    ];

    expect(() => findWorkerUserData('demo', 'ams1', devices)).toThrow(
      'having two devices with the same name ("a") in the same facility ("ams1") is not supported',
    );
    expect(() => findWorkerUserData('demo', 'ams1', devices)).toThrow(DuplicateDeviceError);
  });

  it('fails when no worker matches', () => {
    const devices: Device[] = [{ hostname: 'demo-controller-0', facility: 'ams1', userData: 'controller' }];

    expect(() => findWorkerUserData('demo', 'ams1', devices)).toThrow(
      'cluster "demo" must have at least one worker node but no worker was found',
    );
  });

  it('does not count a worker without user data', () => {
    const devices: Device[] = [{ hostname: 'demo-worker-0', facility: 'ams1', userData: '' }];

    expect(() => findWorkerUserData('demo', 'ams1', devices)).toThrow(WorkerNotFoundError);
  });
});
