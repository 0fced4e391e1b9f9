// SPDX-License-Identifier: Apache-2.0

/**
 * Splits a multi-document YAML blob on `---` separator lines.
 */
export class ManifestSplitter {
  private static readonly DOCUMENT_SEPARATOR: RegExp = /^---[ \t]*\r?$/m;

  /**
   * Returns the non-blank segments of the manifest in source order. A manifest of separators and whitespace yields
   * an empty list.
   */
  public static split(manifest: string): string[] {
    return manifest
      .split(ManifestSplitter.DOCUMENT_SEPARATOR)
      .filter((segment: string): boolean => segment.trim().length > 0);
  }
}
