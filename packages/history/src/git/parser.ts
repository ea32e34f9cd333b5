import type { FileDiffStat, RawCommit } from './types';

export const RECORD_SEPARATOR = '\x1e';
export const FIELD_SEPARATOR = '\x1f';

/** `git log --format` producing one header line per commit for {@link CommitLogParser}. */
export const COMMIT_HEADER_FORMAT = '%x1e%H%x1f%P%x1f%ae%x1f%an%x1f%at%x1f%s';

const NUMSTAT_LINE = /^(\d+|-)\t(\d+|-)\t(.+)$/;

/**
 * Incremental parser for `git log --numstat` output written with {@link COMMIT_HEADER_FORMAT}.
 * A commit is complete once the next header (or the end of input) is seen.
 */
export class CommitLogParser {
  private current: RawCommit | null = null;

  push(line: string): RawCommit | null {
    if (line.startsWith(RECORD_SEPARATOR)) {
      const finished = this.current;
      this.current = parseHeader(line.slice(1));
      return finished;
    }

    if (line.trim() === '' || !this.current) {
      return null;
    }

    const stat = parseNumstatLine(line);
    if (stat) {
      this.current.files.push(stat);
    } else if (!this.current.error) {
      this.current.error = `Malformed numstat line: ${JSON.stringify(line)}`;
    }
    return null;
  }

  end(): RawCommit | null {
    const finished = this.current;
    this.current = null;
    return finished;
  }
}

function parseHeader(header: string): RawCommit {
  const fields = header.split(FIELD_SEPARATOR);
  const [commitId = '', parents = '', author = '', authorName = '', time = '', ...rest] = fields;
  const commit: RawCommit = {
    commitId,
    parentIds: parents ? parents.split(' ') : [],
    author,
    authorName,
    timestamp: Number(time),
    // Subjects may contain the separator; keep everything after the fifth field.
    subject: rest.join(FIELD_SEPARATOR),
    files: [],
  };

  if (fields.length < 6) {
    commit.error = `Malformed commit header: expected 6 fields, found ${fields.length}`;
  } else if (!time || !Number.isInteger(commit.timestamp)) {
    commit.error = `Malformed author timestamp: ${JSON.stringify(time)}`;
  }
  return commit;
}

export function parseNumstatLine(line: string): FileDiffStat | null {
  const match = NUMSTAT_LINE.exec(line);
  if (!match) {
    return null;
  }
  const [, added, removed, rawPath] = match;
  const binary = added === '-' || removed === '-';
  return {
    path: unquotePath(rawPath),
    insertions: added === '-' ? 0 : Number(added),
    deletions: removed === '-' ? 0 : Number(removed),
    binary,
  };
}

const SIMPLE_ESCAPES: Record<string, number> = {
  a: 0x07,
  b: 0x08,
  t: 0x09,
  n: 0x0a,
  v: 0x0b,
  f: 0x0c,
  r: 0x0d,
  '"': 0x22,
  '\\': 0x5c,
};

/**
 * Undoes git's C-style quoting of unusual file names (`"dir/tab\there.txt"`).
 * Octal escapes are UTF-8 bytes.
 */
export function unquotePath(raw: string): string {
  if (raw.length < 2 || !raw.startsWith('"') || !raw.endsWith('"')) {
    return raw;
  }

  // By code point, so characters outside the BMP stay whole.
  const body = Array.from(raw.slice(1, -1));
  const bytes: number[] = [];
  for (let i = 0; i < body.length; i++) {
    const ch = body[i];
    if (ch !== '\\' || i === body.length - 1) {
      bytes.push(...Buffer.from(ch, 'utf8'));
      continue;
    }

    const next = body[i + 1];
    const octal = /^[0-7]{3}/.exec(body.slice(i + 1, i + 4).join(''));
    if (octal) {
      bytes.push(parseInt(octal[0], 8));
      i += 3;
    } else if (next in SIMPLE_ESCAPES) {
      bytes.push(SIMPLE_ESCAPES[next]);
      i += 1;
    } else {
      bytes.push(...Buffer.from(ch, 'utf8'));
    }
  }
  return Buffer.from(bytes).toString('utf8');
}
