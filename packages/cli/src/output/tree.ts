import pc from 'picocolors';
import { ROOT_PATH, type NavigationModel, type NodeStats, type NodeView } from '@histree/history';

export type Colors = ReturnType<typeof pc.createColors>;

export interface TreeRenderOptions {
  /** Levels below the root shown without an explicit expand */
  depth: number;
  /** Children listed per directory */
  limit: number;
  colors?: Colors;
}

export function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

/** UTC calendar date of a Unix timestamp in seconds. */
export function formatDate(timestamp: number | null): string {
  if (timestamp === null) {
    return '-';
  }
  return new Date(timestamp * 1000).toISOString().slice(0, 10);
}

export function formatStats(stats: NodeStats): string {
  return [
    plural(stats.commitCount, 'commit'),
    `+${stats.insertions} -${stats.deletions}`,
    plural(stats.authorCount, 'author'),
    formatDate(stats.latestChange),
  ].join(', ');
}

function describe(node: NodeView, c: Colors): string {
  const name = node.kind === 'dir' ? c.bold(`${node.name}/`) : node.name;
  if (node.error) {
    return `${name}  ${c.red(`(failed: ${node.error})`)}`;
  }
  if (node.loadState === 'loading') {
    return `${name}  ${c.dim('(loading)')}`;
  }
  if (!node.stats) {
    return `${name}  ${c.dim('(not loaded)')}`;
  }
  return `${name}  ${c.dim(formatStats(node.stats))}`;
}

/**
 * Draws the navigation model as an indented tree. Directories within `depth`
 * levels are opened, deeper ones only when expanded.
 */
export function renderTree(model: NavigationModel, options: TreeRenderOptions): string[] {
  const c = options.colors ?? pc.createColors(false);
  const root = model.getNode(ROOT_PATH);
  const lines = [root?.stats ? `.  ${c.dim(formatStats(root.stats))}` : '.'];

  const walk = (path: string, prefix: string, level: number) => {
    const children = model.children(path);
    const shown = children.slice(0, options.limit);
    const hidden = children.length - shown.length;

    shown.forEach((child, index) => {
      const last = index === shown.length - 1 && hidden === 0;
      lines.push(`${prefix}${last ? '└── ' : '├── '}${describe(child, c)}`);
      if (child.childCount > 0 && (level < options.depth || child.expanded)) {
        walk(child.path, `${prefix}${last ? '    ' : '│   '}`, level + 1);
      }
    });
    if (hidden > 0) {
      lines.push(`${prefix}└── ${c.dim(`… ${hidden} more`)}`);
    }
  };

  walk(ROOT_PATH, '', 1);
  return lines;
}

export interface TreeJson {
  path: string;
  name: string;
  kind: NodeView['kind'];
  loadState: NodeView['loadState'];
  stats: NodeStats | null;
  error?: string;
  children?: TreeJson[];
  /** Children beyond the listing limit */
  omitted?: number;
}

/** Same selection of nodes as {@link renderTree}, as plain data. */
export function treeToJson(model: NavigationModel, options: TreeRenderOptions): TreeJson | null {
  const root = model.getNode(ROOT_PATH);
  if (!root) {
    return null;
  }

  const toJson = (node: NodeView, level: number): TreeJson => {
    const json: TreeJson = {
      path: node.path,
      name: node.name,
      kind: node.kind,
      loadState: node.loadState,
      stats: node.stats,
    };
    if (node.error) {
      json.error = node.error;
    }
    const open = level < options.depth || node.expanded;
    if (node.childCount > 0 && open) {
      const children = model.children(node.path);
      json.children = children.slice(0, options.limit).map((child) => toJson(child, level + 1));
      if (children.length > options.limit) {
        json.omitted = children.length - options.limit;
      }
    }
    return json;
  };

  return toJson(root, 0);
}
