// SPDX-License-Identifier: Apache-2.0

/**
 * The group, version and plural resource name that address a kind on the Kubernetes API.
 */
export class ResourceCoordinate {
  public constructor(
    public readonly group: string,
    public readonly version: string,
    public readonly resourcePlural: string,
  ) {}

  public static of(group: string, version: string, resourcePlural: string): ResourceCoordinate {
    return new ResourceCoordinate(group, version, resourcePlural);
  }

  /**
   * The `apiVersion` value an object of this coordinate carries: `group/version`, or `version` for the core group.
   */
  public get apiVersion(): string {
    return this.group ? `${this.group}/${this.version}` : this.version;
  }

  public equals(other: ResourceCoordinate): boolean {
    return (
      this.group === other.group && this.version === other.version && this.resourcePlural === other.resourcePlural
    );
  }

  public toString(): string {
    return `${this.group || 'core'}/${this.version}/${this.resourcePlural}`;
  }
}
