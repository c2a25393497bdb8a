#!/usr/bin/env node

import {
  createConnection,
  TextDocuments,
  ProposedFeatures,
  TextDocumentSyncKind,
  type InitializeParams,
  type InitializeResult,
  type Diagnostic,
  type CompletionItem,
  type TextDocumentPositionParams,
  type Location,
  type Hover,
  type DocumentHighlight,
  type DocumentSymbol,
  type DocumentSymbolParams,
} from 'vscode-languageserver/node';

import { TextDocument } from 'vscode-languageserver-textdocument';

import { DocumentCache, type CacheEntry } from './document-cache';
import {
  completionItems,
  definitionRange,
  documentSymbols,
  highlights,
  hoverAt,
  referenceRanges,
  toLspDiagnostic,
} from './features';

// Create connection using stdio
const connection = createConnection(ProposedFeatures.all);

// Document manager
const documents: TextDocuments<TextDocument> = new TextDocuments(TextDocument);

const cache = new DocumentCache();

connection.onInitialize((_params: InitializeParams): InitializeResult => {
  return {
    capabilities: {
      textDocumentSync: TextDocumentSyncKind.Incremental,
      completionProvider: {},
      hoverProvider: true,
      definitionProvider: true,
      referencesProvider: true,
      documentHighlightProvider: true,
      documentSymbolProvider: true,
    },
  };
});

connection.onInitialized(() => {
  connection.console.log('Tarn Language Server initialized');
});

// Document change handler
documents.onDidChangeContent((change) => {
  validateDocument(change.document);
});

documents.onDidClose((event) => {
  cache.delete(event.document.uri);
  publishDiagnostics(event.document.uri, []);
});

/**
 * Parse a document and publish its parse error, if any
 */
function validateDocument(document: TextDocument): void {
  const entry = cache.update(document);

  if (entry.error) {
    connection.console.info(entry.error.toString());
  }

  publishDiagnostics(document.uri, entry.error ? [toLspDiagnostic(document, entry.error)] : []);
}

function publishDiagnostics(uri: string, diagnostics: Diagnostic[]): void {
  connection.sendDiagnostics({ uri, diagnostics }).catch((error: unknown) => {
    connection.console.error(`Failed to publish diagnostics for ${uri}: ${String(error)}`);
  });
}

/**
 * Parse results for a document, parsing on demand
 */
function getEntry(uri: string): CacheEntry | undefined {
  const cached = cache.get(uri);
  if (cached) {
    return cached;
  }

  const document = documents.get(uri);
  return document ? cache.update(document) : undefined;
}

/**
 * Completion handler
 */
connection.onCompletion((params: TextDocumentPositionParams): CompletionItem[] => {
  const entry = getEntry(params.textDocument.uri);
  return entry ? completionItems(entry.source, entry.decls, params.position) : [];
});

/**
 * Hover handler
 */
connection.onHover((params: TextDocumentPositionParams): Hover | null => {
  const entry = getEntry(params.textDocument.uri);
  return entry ? hoverAt(entry.source, entry.decls, params.position) : null;
});

/**
 * Go to definition handler
 */
connection.onDefinition((params: TextDocumentPositionParams): Location | null => {
  const entry = getEntry(params.textDocument.uri);
  const range = entry ? definitionRange(entry.source, entry.decls, params.position) : null;
  return range ? { uri: params.textDocument.uri, range } : null;
});

/**
 * Find references handler
 */
connection.onReferences((params): Location[] => {
  const entry = getEntry(params.textDocument.uri);
  if (!entry) return [];
  return referenceRanges(entry.source, entry.decls, params.position).map((range) => ({
    uri: params.textDocument.uri,
    range,
  }));
});

/**
 * Document highlight handler (highlight all occurrences of symbol under cursor)
 */
connection.onDocumentHighlight((params: TextDocumentPositionParams): DocumentHighlight[] => {
  const entry = getEntry(params.textDocument.uri);
  return entry ? highlights(entry.source, entry.decls, params.position) : [];
});

connection.onDocumentSymbol((params: DocumentSymbolParams): DocumentSymbol[] => {
  const entry = getEntry(params.textDocument.uri);
  return entry ? documentSymbols(entry.source, entry.decls) : [];
});

// Listen for document changes
documents.listen(connection);

// Start the connection
connection.listen();
