import type { DiffEntry } from '@changetree/shared';
import { ParseError } from '../errors';
import type { ChangeFact } from './facts';
import { toSegments } from '../tree/paths';
import { payloadFromFacts } from './payload';
import { sizeToBytes } from './units';

// ============================================================================
// Line grammar
// ============================================================================

const OWNER = String.raw`\[[\w .-]+:[\w .-]+ -> [\w .-]+:[\w .-]+\]`;
const MODE = String.raw`\[[\w-]{10} -> [\w-]{10}\]`;

/** `added 20 B`, `removed directory`, `added link` */
const ADDED_REMOVED = String.raw`(?<ar>added|removed)\s+(?<arType>directory|link|(?<size>[\d.]+) (?<sizeUnit>\w+))\s+`;

/** `changed link`, optionally with an owner change */
const CHANGED_LINK = String.raw`(?<cl>changed link)\s+(?:(?<clOwner>${OWNER})\s+)?`;

/** `+77.8 kB -77.8 kB [user:group -> user:group] [-rw-rw-rw- -> -rw-r--r--]`, each part optional */
const MODIFIED =
  String.raw`(?:\+?(?<added>[\d.]+) (?<addedUnit>\w+)\s+-?(?<removed>[\d.]+) (?<removedUnit>\w+)\s+)?` +
  String.raw`(?:(?<owner>${OWNER})\s+)?(?:(?<mode>${MODE})\s+)?`;

const CHANGED_FILE_RE = new RegExp(
  String.raw`^\s*(?:${ADDED_REMOVED}|${CHANGED_LINK}|${MODIFIED})(?<path>.*)$`
);

const OWNER_RE = /^\[(?<oldUser>[\w .-]+):(?<oldGroup>[\w .-]+) -> (?<newUser>[\w .-]+):(?<newGroup>[\w .-]+)\]$/;
const MODE_RE = /^\[(?<oldMode>[\w-]{10}) -> (?<newMode>[\w-]{10})\]$/;

type LineGroups = Partial<Record<string, string>>;

// ============================================================================
// Parser
// ============================================================================

/**
 * Parse the plain text output of an archive diff, one changed path per line:
 *
 *     [-rw-rw-r-- -> lrwxrwxrwx] home/user/Documents/testdir/file2
 *         +32 B     -36 B [-r--rw---- -> -rwxrwx--x] home/user/Documents/testfile.txt
 *     added directory     home/user/Documents/newfolder
 *     removed         0 B home/user/Documents/testdir/file1
 *     changed link        home/user/Documents/testlink
 *
 * Blank lines are skipped. Any other line that does not parse fails the
 * whole batch.
 */
export function parseDiffLines(input: string | readonly string[]): DiffEntry[] {
  const lines = typeof input === 'string' ? input.split(/\r?\n/) : input;
  const entries: DiffEntry[] = [];

  for (const line of lines) {
    if (line.trim() === '') continue;
    entries.push(parseDiffLine(line));
  }

  return entries;
}

export function parseDiffLine(line: string): DiffEntry {
  const match = CHANGED_FILE_RE.exec(line);
  if (!match) {
    throw new ParseError("Couldn't parse diff output", line);
  }

  const groups: LineGroups = match.groups ?? {};
  const path = (groups.path ?? '').trim();
  const facts = factsFromGroups(groups, line);

  if (facts.length === 0) {
    throw new ParseError("Couldn't parse diff output", line);
  }
  // `/` or `.` names the root, which has no entry of its own
  if (toSegments(path).length === 0) {
    throw new ParseError('Missing path in diff output', line);
  }

  return { path, payload: payloadFromFacts(facts) };
}

function factsFromGroups(groups: LineGroups, line: string): ChangeFact[] {
  if (groups.ar === 'added' || groups.ar === 'removed') {
    return [addedRemovedFact(groups.ar, groups, line)];
  }

  if (groups.cl) {
    const facts: ChangeFact[] = [{ type: 'changed link' }];
    if (groups.clOwner) {
      facts.push(ownerFact(groups.clOwner, line));
    }
    return facts;
  }

  const facts: ChangeFact[] = [];
  if (groups.added !== undefined && groups.removed !== undefined) {
    facts.push({
      type: 'modified',
      added: sizeToBytes(groups.added, groups.addedUnit ?? '', line),
      removed: sizeToBytes(groups.removed, groups.removedUnit ?? '', line),
    });
  }
  if (groups.owner) {
    facts.push(ownerFact(groups.owner, line));
  }
  if (groups.mode) {
    facts.push(modeFact(groups.mode, line));
  }
  return facts;
}

function addedRemovedFact(action: 'added' | 'removed', groups: LineGroups, line: string): ChangeFact {
  const added = action === 'added';

  switch (groups.arType) {
    case 'directory':
      return { type: added ? 'added directory' : 'removed directory' };
    case 'link':
      return { type: added ? 'added link' : 'removed link' };
    default: {
      const size = sizeToBytes(groups.size ?? '', groups.sizeUnit ?? '', line);
      return added ? { type: 'added', size } : { type: 'removed', size };
    }
  }
}

function ownerFact(clause: string, line: string): ChangeFact {
  const owner = OWNER_RE.exec(clause)?.groups;
  if (!owner) {
    throw new ParseError('Malformed owner change', line);
  }

  return {
    type: 'owner',
    old_user: owner.oldUser,
    old_group: owner.oldGroup,
    new_user: owner.newUser,
    new_group: owner.newGroup,
  };
}

function modeFact(clause: string, line: string): ChangeFact {
  const mode = MODE_RE.exec(clause)?.groups;
  if (!mode) {
    throw new ParseError('Malformed mode change', line);
  }

  return { type: 'mode', old_mode: mode.oldMode, new_mode: mode.newMode };
}
