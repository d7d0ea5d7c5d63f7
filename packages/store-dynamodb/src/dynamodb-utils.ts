const MAX_DYNAMO_KEY_PART_BYTES = 512;

export function assertDynamoKeyPart(
  value: string,
  label: string,
  maxBytes = MAX_DYNAMO_KEY_PART_BYTES,
): void {
  if (value.length === 0) {
    throw new Error(`${label} must not be empty`);
  }

  for (let i = 0; i < value.length; i++) {
    const charCode = value.charCodeAt(i);
    if (charCode < 0x20 || charCode === 0x7f) {
      throw new Error(`${label} contains unsupported control characters`);
    }
  }

  if (Buffer.byteLength(value, 'utf8') > maxBytes) {
    throw new Error(`${label} exceeds maximum length of ${maxBytes} bytes`);
  }
}

/** Epoch seconds at which a value written now with `ttlSeconds` expires. */
export function expiryEpochSeconds(ttlSeconds: number, now: number = Date.now()): number {
  return Math.ceil((now + ttlSeconds * 1000) / 1000);
}
