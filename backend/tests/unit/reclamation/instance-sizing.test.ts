import { describe, it, expect } from 'vitest';
import { adjacentInstanceType } from '../../../src/lib/reclamation/instance-sizing.js';

describe('adjacentInstanceType', () => {
  it('steps one size down or up within the family', () => {
    expect(adjacentInstanceType('m5.xlarge', 'Downsize')).toBe('m5.large');
    expect(adjacentInstanceType('m5.xlarge', 'Upsize')).toBe('m5.2xlarge');
    expect(adjacentInstanceType('t3.small', 'Downsize')).toBe('t3.micro');
    expect(adjacentInstanceType('r6g.8xlarge', 'Upsize')).toBe('r6g.16xlarge');
  });

  it('returns undefined at either end of the ladder', () => {
    expect(adjacentInstanceType('t3.nano', 'Downsize')).toBeUndefined();
    expect(adjacentInstanceType('m5.16xlarge', 'Upsize')).toBeUndefined();
  });

  it('returns undefined for sizes off the ladder and malformed types', () => {
    expect(adjacentInstanceType('m5.metal', 'Downsize')).toBeUndefined();
    expect(adjacentInstanceType('c5.12xlarge', 'Upsize')).toBeUndefined();
    expect(adjacentInstanceType('large', 'Downsize')).toBeUndefined();
    expect(adjacentInstanceType('.large', 'Upsize')).toBeUndefined();
  });
});
