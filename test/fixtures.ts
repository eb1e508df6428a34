import type { Camera, ErrorResult, Network, Organization, SuccessResult, UnavailableResult } from '../src/types.js';
import { camera, imageUrlFor, network, org } from './helpers.js';

export function success(o: Organization, n: Network, c: Camera): SuccessResult {
  return {
    organization: o,
    network: n,
    camera: c,
    status: 'success',
    imageUrl: imageUrlFor(c.serial),
    image: Buffer.from(`image-${c.serial}`),
  };
}

export function failed(o: Organization, n: Network, c: Camera, reason = 'Camera is offline'): ErrorResult {
  return { organization: o, network: n, camera: c, status: 'error', errorKind: 'permanent', reason };
}

export function unavailable(o: Organization, n: Network, c: Camera): UnavailableResult {
  return { organization: o, network: n, camera: c, status: 'unavailable', reason: 'Model CW9 does not support snapshots' };
}

export const O = org('O1', 'O');
export const N = network('N1', 'O1', 'N');
export const A = camera('Q2AA-0001', 'N1', 'A');
export const B = camera('Q2BB-0002', 'N1', 'B');
export const C = camera('Q2CC-0003', 'N1', 'C');
export const D = camera('Q2DD-0004', 'N1', 'D', 'CW9');
