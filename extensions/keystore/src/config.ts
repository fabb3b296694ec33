export type ScryptParams = {
  /** CPU/memory cost, a power of two. */
  n: number;
  r: number;
  p: number;
  /** Derived key length in bytes. The v3 format fixes this at 32. */
  dklen: 32;
};

export type KeystoreConfig = {
  /** Profile name; each profile owns exactly one keystore file. */
  profile: string;
  /** Explicit keystore file path. Overrides the per-profile default. */
  storePath?: string;
  /** Stable device identifier used when no password is supplied. */
  deviceId?: string;
  scrypt: ScryptParams;
};

export const DEFAULT_SCRYPT_PARAMS: ScryptParams = {
  n: 262_144,
  r: 1,
  p: 8,
  dklen: 32,
};

export const DEFAULT_KEYSTORE_CONFIG: KeystoreConfig = {
  profile: "default",
  scrypt: DEFAULT_SCRYPT_PARAMS,
};

const PROFILE_PATTERN = /^[a-zA-Z0-9_-]{1,64}$/;

function isPowerOfTwo(value: number): boolean {
  return Number.isInteger(value) && value > 1 && (value & (value - 1)) === 0;
}

function positiveInt(value: unknown, fallback: number): number {
  return typeof value === "number" && Number.isInteger(value) && value > 0 ? value : fallback;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim().length > 0 ? value.trim() : undefined;
}

export function resolveKeystoreConfig(raw?: Record<string, unknown>): KeystoreConfig {
  if (!raw) return { ...DEFAULT_KEYSTORE_CONFIG };

  const profileRaw = nonEmptyString(raw.profile);
  const profile =
    profileRaw && PROFILE_PATTERN.test(profileRaw) ? profileRaw : DEFAULT_KEYSTORE_CONFIG.profile;

  const scryptRaw: Record<string, unknown> = isRecord(raw.scrypt) ? raw.scrypt : {};
  const n = positiveInt(scryptRaw.n, DEFAULT_SCRYPT_PARAMS.n);

  return {
    profile,
    storePath: nonEmptyString(raw.storePath),
    deviceId: nonEmptyString(raw.deviceId),
    scrypt: {
      n: isPowerOfTwo(n) ? n : DEFAULT_SCRYPT_PARAMS.n,
      r: positiveInt(scryptRaw.r, DEFAULT_SCRYPT_PARAMS.r),
      p: positiveInt(scryptRaw.p, DEFAULT_SCRYPT_PARAMS.p),
      dklen: 32,
    },
  };
}
