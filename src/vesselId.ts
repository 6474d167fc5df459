import { InvalidVesselIdError } from './errors';
import type { VesselId } from './types';

const VESSEL_ID_PATTERN = /^\d{7}$/;
const IMO_PREFIX = /^IMO[\s_-]*/i;
const IMO_FOLDER_PATTERN = /^(?:IMO[\s_-]*)?(\d{7})$/i;

export function isVesselId(value: string): boolean {
  return VESSEL_ID_PATTERN.test(value);
}

/**
 * Normalize a raw identifier from a tracker, CSV or CLI argument.
 * Returns null for anything that is not a 7-digit IMO number.
 */
export function normalizeVesselId(raw: unknown): VesselId | null {
  if (typeof raw !== 'string' && typeof raw !== 'number') return null;
  const trimmed = String(raw).trim().replace(IMO_PREFIX, '');
  return isVesselId(trimmed) ? trimmed : null;
}

export function requireVesselId(raw: string): VesselId {
  const id = normalizeVesselId(raw);
  if (!id) throw new InvalidVesselIdError(raw);
  return id;
}

/**
 * Match a storage folder name such as `IMO_9169031` or `9169031`.
 */
export function vesselIdFromFolder(name: string): VesselId | null {
  const match = name.match(IMO_FOLDER_PATTERN);
  return match ? match[1] : null;
}

export function vesselFolderName(id: VesselId): string {
  return `IMO_${id}`;
}
