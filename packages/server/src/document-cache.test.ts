import { describe, it } from 'node:test';
import * as assert from 'node:assert';
import { TextDocument } from 'vscode-languageserver-textdocument';
import { DocumentCache } from './document-cache';

const URI = 'file:///a.tarn';

function doc(version: number, text: string): TextDocument {
  return TextDocument.create(URI, 'tarn', version, text);
}

describe('DocumentCache', () => {
  it('caches declarations per version', () => {
    const cache = new DocumentCache();
    const entry = cache.update(doc(1, 'f x = x'));
    assert.strictEqual(entry.error, undefined);
    assert.deepStrictEqual(entry.decls.map((decl) => decl.id.name), ['f']);
    assert.strictEqual(cache.update(doc(1, 'ignored')), entry);
  });

  it('keeps the last declarations that parsed', () => {
    const cache = new DocumentCache();
    const good = cache.update(doc(1, 'f x = x'));
    const broken = cache.update(doc(2, 'f x'));

    assert.strictEqual(broken.error?.toString(), "file:///a.tarn:1:3: error: hit EOF but expected '='");
    assert.strictEqual(broken.decls, good.decls);
    assert.strictEqual(broken.source.getText(), 'f x = x');
    assert.strictEqual(cache.get(URI), broken);
  });

  it('copies the text of the version it parsed', () => {
    const cache = new DocumentCache();
    const live = doc(1, 'f = 1');
    const entry = cache.update(live);
    TextDocument.update(live, [{ text: 'g = 2' }], 2);

    assert.strictEqual(entry.source.getText(), 'f = 1');
    assert.strictEqual(entry.source.version, 1);
  });

  it('starts empty when the first version fails', () => {
    const cache = new DocumentCache();
    assert.deepStrictEqual(cache.update(doc(1, '= 1')).decls, []);
  });

  it('forgets closed documents', () => {
    const cache = new DocumentCache();
    cache.update(doc(1, 'f = 1'));
    cache.delete(URI);
    assert.strictEqual(cache.get(URI), undefined);
  });
});
