/**
 * Per-path change summary produced by parsing archive diff output
 */
export interface DiffPayload {
  kind: FileKind;
  change: ChangeType;
  sizeDelta: number;
  modeChange?: ModeChange;
  ownerChange?: OwnerChange;
  contentDelta?: ContentDelta;
  linkChanged?: boolean;
}

export type FileKind = 'file' | 'directory' | 'link';

/**
 * Reduced change classification. 'none' only appears on placeholder
 * directories created for deeper paths.
 */
export type ChangeType = 'none' | 'added' | 'removed' | 'modified';

export interface ModeChange {
  oldMode: string;
  newMode: string;
}

export interface OwnerChange {
  oldUser: string;
  oldGroup: string;
  newUser: string;
  newGroup: string;
}

/**
 * Bytes added and removed inside a modified file
 */
export interface ContentDelta {
  added: number;
  removed: number;
}

export interface DiffEntry {
  path: string;
  payload: DiffPayload;
}
