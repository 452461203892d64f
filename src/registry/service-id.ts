import { createHash } from 'node:crypto';

/**
 * Opaque capability identifier a peer advertises.
 * Compared by value, never interpreted by the registry.
 */
export type ServiceId = string;

/** Service ids are 20 bytes, rendered as lowercase hex */
export const SERVICE_ID_LENGTH = 20;

/**
 * Renders raw service id bytes as a ServiceId.
 *
 * @throws Error if the byte length is not SERVICE_ID_LENGTH
 */
export function serviceIdFromBytes(bytes: Uint8Array): ServiceId {
  if (bytes.length !== SERVICE_ID_LENGTH) {
    throw new Error(`Invalid service id: expected ${SERVICE_ID_LENGTH} bytes, got ${bytes.length}`);
  }
  return Buffer.from(bytes).toString('hex');
}

/**
 * Compute a content-addressed service id from a service name and version.
 * The same name and version always give the same id on every node.
 */
export function createServiceId(name: string, version = '1'): ServiceId {
  const canonical = JSON.stringify({ name, version });
  return createHash('sha1').update(canonical).digest('hex');
}
