import { LAST_EDITED_KEY, type ChangeStatus, type StoredArtifact } from '../types/index.js';

export interface ChangeInput {
  currentEdited: string;
  /** `null` when the store holds no artifact for the page. */
  storedEdited: string | null;
  force?: boolean;
}

/**
 * Classify a page against its stored artifact. Timestamps are compared as
 * opaque strings, so any formatting difference counts as a change.
 */
export function detectChange({ currentEdited, storedEdited, force = false }: ChangeInput): ChangeStatus {
  if (storedEdited === null) return 'new';
  if (!force && currentEdited === storedEdited) return 'unchanged';
  return 'changed';
}

/** The change fingerprint recorded on an artifact; `''` when the key is missing, `null` without an artifact. */
export function storedFingerprint(artifact: StoredArtifact | null | undefined): string | null {
  if (!artifact) return null;
  return artifact.metadata[LAST_EDITED_KEY] ?? '';
}
