// Logical name <-> physical path translation.
//
// Cloud keys always use `/`. Local paths use the platform separator, but the
// names handed back to callers use `/` on every platform.

import path from 'node:path';

export type PathFlavor = 'posix' | 'native';

export function trimSeparatorPrefix(value: string): string {
  return value.replace(/^[\\/]+/, '');
}

export function trimSeparatorSuffix(value: string): string {
  return value.replace(/[\\/]+$/, '');
}

/**
 * Deterministic, invertible mapping between object names and physical paths.
 *
 * `toBaseName(objectPath(name)) === name` holds for every name made of
 * non-empty segments other than `.` and `..`, without leading or trailing `/`.
 */
export class PathResolver {
  private readonly impl: path.PlatformPath;
  private readonly separators: RegExp;
  readonly suffix: string;

  constructor(
    readonly basePath: string,
    readonly extension: string,
    flavor: PathFlavor = 'posix'
  ) {
    this.impl = flavor === 'posix' ? path.posix : path;
    // a backslash is a separator only on win32; elsewhere it belongs to the name
    this.separators = this.impl.sep === '\\' ? /[\\/]+/ : /\/+/;
    this.suffix = extension ? `.${extension}` : '';
  }

  /** Name with the configured extension appended */
  withExtension(name: string): string {
    return name + this.suffix;
  }

  objectPath(name: string): string {
    const file = this.withExtension(name);
    return this.basePath ? this.impl.join(this.basePath, file) : this.impl.normalize(file);
  }

  toBaseName(physical: string): string {
    let name = physical;
    if (this.suffix && name.endsWith(this.suffix)) {
      name = name.slice(0, -this.suffix.length);
    }
    if (this.basePath && name.startsWith(this.basePath)) {
      const rest = name.slice(this.basePath.length);
      if (this.startsWithSeparator(rest)) name = rest;
    }
    const parts = name.split(this.separators);
    if (parts[0] === '') parts.shift();
    return parts.join('/');
  }

  private startsWithSeparator(value: string): boolean {
    const match = this.separators.exec(value);
    return match?.index === 0;
  }

  /**
   * `<baseUrl>/<name>[.<extension>]`, the same shape for every backend.
   * Query and fragment are dropped: they configure the client (region,
   * credentials) and do not identify the object.
   */
  objectUrl(baseUrl: URL, name: string): string {
    const base = new URL(baseUrl.toString());
    base.search = '';
    base.hash = '';
    return `${trimSeparatorSuffix(base.toString())}/${trimSeparatorPrefix(this.withExtension(name))}`;
  }
}
