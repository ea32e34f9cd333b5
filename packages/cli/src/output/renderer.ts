import pc from 'picocolors';
import type { NavigationModel, NavigationStatus } from '@histree/history';
import { plural, renderTree, treeToJson, type Colors, type TreeRenderOptions } from './tree';

export interface BrowseView extends Omit<TreeRenderOptions, 'colors'> {
  repoRoot: string;
  navigator: NavigationModel;
}

export class OutputRenderer {
  private readonly colors: Colors;

  constructor(
    private isJson: boolean,
    colors: boolean = pc.isColorSupported,
  ) {
    this.colors = pc.createColors(colors);
  }

  render(view: BrowseView): void {
    if (this.isJson) {
      const { navigator, repoRoot, depth, limit } = view;
      console.log(
        JSON.stringify(
          { repoRoot, status: navigator.status(), tree: treeToJson(navigator, { depth, limit }) },
          null,
          2,
        ),
      );
      return;
    }
    console.log(this.colors.bold(view.repoRoot));
    console.log(renderTree(view.navigator, { ...view, colors: this.colors }).join('\n'));
    console.log(this.colors.dim(statusLine(view.navigator.status())));
  }

  /** Cached results shown while the delta scan runs. Human output only. */
  preview(view: BrowseView, note: string): void {
    if (this.isJson) {
      return;
    }
    console.log(this.colors.yellow(note));
    this.render(view);
    console.log('');
  }
}

export function statusLine(status: NavigationStatus): string {
  const sorted = `sorted by ${status.sortKey}`;
  if (!status.scan) {
    const pending = status.pendingLoads > 0 ? `, ${status.pendingLoads} loading` : '';
    return `lazy mode, ${sorted}${pending}`;
  }

  const scan = status.scan;
  const commits = plural(scan.processedCommits, 'commit');
  const parts = [scan.phase === 'idle' ? `${commits} cached (${scan.freshness})` : `${commits} scanned`];
  if (scan.skippedCommits > 0) {
    parts.push(`${scan.skippedCommits} skipped`);
  }
  parts.push(sorted);

  let line = parts.join(', ');
  if (scan.phase === 'cancelled') {
    line += ' (interrupted)';
  } else if (scan.phase === 'failed') {
    line += ` (scan failed: ${scan.error ?? 'unknown error'})`;
  }
  return line;
}
