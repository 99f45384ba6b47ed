import type { ChangeType, DiffPayload, FileKind } from '@changetree/shared';
import type { ChangeFact, ChangeFactType } from './facts';

type AddRemoveType = Extract<
  ChangeFactType,
  'added' | 'removed' | 'added directory' | 'removed directory' | 'added link' | 'removed link'
>;

const ADD_REMOVE: Record<AddRemoveType, { change: 'added' | 'removed'; kind: FileKind }> = {
  added: { change: 'added', kind: 'file' },
  removed: { change: 'removed', kind: 'file' },
  'added directory': { change: 'added', kind: 'directory' },
  'removed directory': { change: 'removed', kind: 'directory' },
  'added link': { change: 'added', kind: 'link' },
  'removed link': { change: 'removed', kind: 'link' },
};

/**
 * Merge the change facts reported for one path into a single payload.
 *
 * Facts are applied in order, each one setting its own field. An add or
 * remove fact decides the change type and the size; any other fact marks
 * the path as modified. Callers never pass an empty list.
 */
export function payloadFromFacts(facts: readonly ChangeFact[]): DiffPayload {
  let kind: FileKind = 'file';
  let addRemove: { change: 'added' | 'removed'; size: number } | undefined;
  let modified = false;
  const details: Pick<DiffPayload, 'modeChange' | 'ownerChange' | 'contentDelta' | 'linkChanged'> = {};

  for (const fact of facts) {
    switch (fact.type) {
      case 'modified':
        modified = true;
        // modified without byte counts when chunk ids could not be compared
        if (fact.added !== undefined && fact.removed !== undefined) {
          details.contentDelta = { added: fact.added, removed: fact.removed };
        }
        break;
      case 'changed link':
        modified = true;
        kind = 'link';
        details.linkChanged = true;
        break;
      case 'mode':
        modified = true;
        details.modeChange = { oldMode: fact.old_mode, newMode: fact.new_mode };
        break;
      case 'owner':
        modified = true;
        details.ownerChange = {
          oldUser: fact.old_user,
          oldGroup: fact.old_group,
          newUser: fact.new_user,
          newGroup: fact.new_group,
        };
        break;
      case 'added':
      case 'removed':
        kind = ADD_REMOVE[fact.type].kind;
        addRemove = { change: ADD_REMOVE[fact.type].change, size: fact.size ?? 0 };
        break;
      default:
        kind = ADD_REMOVE[fact.type].kind;
        addRemove = { change: ADD_REMOVE[fact.type].change, size: 0 };
    }
  }

  const change: ChangeType = addRemove?.change ?? (modified ? 'modified' : 'none');

  let sizeDelta = 0;
  if (addRemove) {
    sizeDelta = addRemove.change === 'removed' ? negate(addRemove.size) : addRemove.size;
  } else if (details.contentDelta) {
    sizeDelta = details.contentDelta.added - details.contentDelta.removed;
  }

  return { kind, change, sizeDelta, ...details };
}

function negate(value: number): number {
  return value === 0 ? 0 : -value;
}
