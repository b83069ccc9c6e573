/**
 * Module resolution types.
 */

/** Where a search root came from, in lookup order. */
export type SearchLayer = 'workspace' | 'extra-path' | 'interpreter';

export interface SearchRoot {
  readonly directory: string;
  readonly layer: SearchLayer;
}

export type ResolvedModule =
  | {
      readonly modulePath: string;
      readonly filePath: string;
      readonly layer: SearchLayer;
      /** The file is a package `__init__`, so relative imports start at the module itself. */
      readonly isPackage: boolean;
    }
  | {
      readonly modulePath: string;
      readonly layer: 'unresolved';
      /** Roots that were probed, in order. */
      readonly searched: readonly string[];
    };

export type FileProbe = (filePath: string) => Promise<boolean>;
