/**
 * Adjacent EC2 instance sizes within a family, for rightsizing suggestions.
 */

export type SizeDirection = 'Downsize' | 'Upsize';

// Sizes most general-purpose and compute families share
const SIZE_LADDER = [
  'nano',
  'micro',
  'small',
  'medium',
  'large',
  'xlarge',
  '2xlarge',
  '4xlarge',
  '8xlarge',
  '16xlarge',
] as const;

/**
 * `m5.xlarge` -> `m5.large` (Downsize) or `m5.2xlarge` (Upsize).
 * Undefined when the type is malformed, its size is off the ladder, or it is
 * already at the end of the ladder.
 */
export function adjacentInstanceType(instanceType: string, direction: SizeDirection): string | undefined {
  const separator = instanceType.indexOf('.');
  if (separator <= 0) return undefined;

  const family = instanceType.slice(0, separator);
  const size = instanceType.slice(separator + 1);
  const index = SIZE_LADDER.findIndex(step => step === size);
  if (index < 0) return undefined;

  const next = SIZE_LADDER[direction === 'Downsize' ? index - 1 : index + 1];
  return next === undefined ? undefined : `${family}.${next}`;
}
