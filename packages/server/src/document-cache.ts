import { TextDocument } from 'vscode-languageserver-textdocument';
import { parse, type Decl, type ParseError } from '@tarn/parser';

export interface CacheEntry {
  version: number;
  /** Declarations of the last version that parsed */
  decls: Decl[];
  /** Text the declarations were parsed from; their offsets point into it */
  source: TextDocument;
  error?: ParseError;
}

/**
 * Parse results per document URI. A document that currently fails to parse
 * keeps serving the declarations of its last good version.
 */
export class DocumentCache {
  private entries = new Map<string, CacheEntry>();

  update(document: TextDocument): CacheEntry {
    const { uri, version } = document;
    const cached = this.entries.get(uri);
    if (cached && cached.version === version) {
      return cached;
    }

    // Open documents are updated in place, so keep a copy of this version
    const text = document.getText();
    const snapshot = TextDocument.create(uri, document.languageId, version, text);
    const result = parse(text, { filename: uri });
    const entry: CacheEntry = result.ok
      ? { version, decls: result.decls, source: snapshot }
      : {
          version,
          decls: cached?.decls ?? [],
          source: cached?.source ?? snapshot,
          error: result.error,
        };

    this.entries.set(uri, entry);
    return entry;
  }

  get(uri: string): CacheEntry | undefined {
    return this.entries.get(uri);
  }

  delete(uri: string): void {
    this.entries.delete(uri);
  }
}
