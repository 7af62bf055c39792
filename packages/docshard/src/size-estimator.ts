/**
 * Estimated serialized size, in bytes, of the entries of a known record shape.
 * Figures are calibrated on stored documents and deliberately rounded up.
 */
export type SizeProfiles = Readonly<Record<string, number>>;

export const DEFAULT_SIZE_PROFILES = {
  "student-profile": 2000,
  "attendance-event": 500,
} as const satisfies SizeProfiles;

export type SizeEstimator = (kind: string | undefined, payload: unknown) => number;

const encoder = new TextEncoder();

/**
 * UTF-8 byte length of the JSON form of `payload`. Values JSON cannot represent at the top level
 * (undefined, functions) count as zero.
 */
export const serializedByteLength = (payload: unknown): number => {
  const serialized: string | undefined = JSON.stringify(payload);
  return serialized === undefined ? 0 : encoder.encode(serialized).length;
};

export const createSizeEstimator =
  (profiles: SizeProfiles = DEFAULT_SIZE_PROFILES): SizeEstimator =>
  (kind, payload) => {
    if (kind !== undefined && Object.hasOwn(profiles, kind)) {
      const profile = profiles[kind];
      if (profile !== undefined) {
        return profile;
      }
    }
    return serializedByteLength(payload);
  };

export const estimateEntrySize: SizeEstimator = createSizeEstimator();
