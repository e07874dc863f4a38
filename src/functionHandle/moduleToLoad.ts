import { InvalidModuleToLoadError } from '../errors';
import { decodeWith } from '../utils/decode';
import { ModuleToLoadDict, moduleToLoadDictSchema } from './schema';

/**
 * @param href URL-style reference, resolved by the host application
 * @param filename path on disk
 */
export interface ModuleToLoadOptions {
  href?: string;
  filename?: string;
}

export class ModuleToLoad {
  public static fromDict(moduleDict: unknown): ModuleToLoad {
    return new ModuleToLoad(decodeWith(moduleToLoadDictSchema, moduleDict, 'module to load'));
  }

  private readonly reference: Readonly<ModuleToLoadDict>;

  constructor(options: ModuleToLoadOptions) {
    const { href, filename } = options;
    if (href === '' || filename === '') {
      throw new InvalidModuleToLoadError();
    }
    if (href !== undefined && filename === undefined) {
      this.reference = Object.freeze({ href });
    } else if (filename !== undefined && href === undefined) {
      this.reference = Object.freeze({ filename });
    } else {
      throw new InvalidModuleToLoadError();
    }
    Object.freeze(this);
  }

  get href(): string | null {
    return 'href' in this.reference ? this.reference.href : null;
  }

  get filename(): string | null {
    return 'filename' in this.reference ? this.reference.filename : null;
  }

  public asDict(): ModuleToLoadDict {
    return { ...this.reference };
  }

  public toString(): string {
    return 'href' in this.reference ? this.reference.href : this.reference.filename;
  }
}
