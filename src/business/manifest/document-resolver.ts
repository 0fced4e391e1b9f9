// SPDX-License-Identifier: Apache-2.0

import yaml from 'yaml';
import {
  documentKind,
  isStructuredDocument,
  type StructuredDocument,
} from '../../integration/kube/resources/dynamic/structured-document.js';
import {ResourceCoordinate} from '../../integration/kube/resources/dynamic/resource-coordinate.js';
import {DocumentDecodeError} from './document-decode-error.js';
import {type Optional} from '../../types/index.js';

export interface ResolvedDocument {
  readonly document: StructuredDocument;
  readonly coordinate: ResourceCoordinate;
}

/**
 * Turns one YAML segment into the objects it describes and the coordinates that address them.
 */
export class DocumentResolver {
  /** Payloads whose JSON encoding is this short or shorter (`null`, `{}`, `[]`, `""`) carry no object. */
  public static readonly MAXIMUM_EMPTY_PAYLOAD_LENGTH: number = 5;

  private static readonly IRREGULAR_PLURALS: ReadonlyMap<string, string> = new Map<string, string>([
    ['logentry', 'logentries'],
    ['kubernetes', 'kuberneteses'],
  ]);

  /**
   * Decodes a segment, applies the namespace override and expands `*List` kinds into their items.
   *
   * @param segment - one YAML document
   * @param namespace - when non-empty, replaces `metadata.namespace` of every resolved object
   * @returns an empty list when the segment holds no object
   */
  public static resolve(segment: string, namespace: string): ResolvedDocument[] {
    const document: Optional<StructuredDocument> = DocumentResolver.decode(segment);
    if (!document) {
      return [];
    }

    const documents: StructuredDocument[] = DocumentResolver.isList(document)
      ? DocumentResolver.listItems(document)
      : [document];

    return documents.map((item: StructuredDocument): ResolvedDocument => {
      if (namespace) {
        item.metadata = {...item.metadata, namespace};
      } else if (item.metadata && !item.metadata.namespace) {
        // a blank `namespace:` decodes to null
        delete item.metadata.namespace;
      }
      return {document: item, coordinate: DocumentResolver.coordinateOf(item)};
    });
  }

  public static decode(segment: string): Optional<StructuredDocument> {
    let parsed: unknown;
    try {
      parsed = yaml.parse(segment);
    } catch (error) {
      throw new DocumentDecodeError(DocumentDecodeError.YAML_TO_JSON, error);
    }

    const encoded: Optional<string> = JSON.stringify(parsed);
    if (encoded === undefined || encoded.length <= DocumentResolver.MAXIMUM_EMPTY_PAYLOAD_LENGTH) {
      return undefined;
    }

    if (!isStructuredDocument(parsed)) {
      throw new DocumentDecodeError(DocumentDecodeError.NOT_AN_OBJECT, undefined, {payload: encoded});
    }

    return parsed;
  }

  public static coordinateOf(document: StructuredDocument): ResourceCoordinate {
    const [group, version] = DocumentResolver.splitApiVersion(document.apiVersion ?? '');
    return ResourceCoordinate.of(group, version, DocumentResolver.pluralize(documentKind(document)));
  }

  /**
   * `group/version` yields both parts, a bare `version` yields the core group, anything else yields neither.
   */
  public static splitApiVersion(apiVersion: string): [string, string] {
    const parts: string[] = apiVersion.split('/');
    switch (parts.length) {
      case 1: {
        return ['', parts[0]];
      }
      case 2: {
        return [parts[0], parts[1]];
      }
      default: {
        return ['', ''];
      }
    }
  }

  public static pluralize(kind: string): string {
    const lower: string = kind.toLowerCase();
    return DocumentResolver.IRREGULAR_PLURALS.get(lower) ?? `${lower}s`;
  }

  private static isList(document: StructuredDocument): boolean {
    return documentKind(document).endsWith('List') && Array.isArray(document.items);
  }

  private static listItems(list: StructuredDocument): StructuredDocument[] {
    const items: unknown[] = Array.isArray(list.items) ? list.items : [];
    return items.map((item: unknown, index: number): StructuredDocument => {
      if (!isStructuredDocument(item)) {
        throw new DocumentDecodeError(DocumentDecodeError.NOT_AN_OBJECT, undefined, {kind: list.kind, index});
      }
      return item;
    });
  }
}
