import type { LazyConfig } from '@histree/shared';

/**
 * Whether to browse lazily. An explicit CLI override wins over `lazy.mode`;
 * `auto` turns lazy mode on above `lazy.fileThreshold` tracked files.
 */
export function resolveLazyMode(config: LazyConfig, estimatedFiles: number, override?: boolean): boolean {
  if (override !== undefined) {
    return override;
  }
  switch (config.mode) {
    case 'on':
      return true;
    case 'off':
      return false;
    case 'auto':
      return estimatedFiles > config.fileThreshold;
  }
}
