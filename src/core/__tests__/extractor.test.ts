// src/core/__tests__/extractor.test.ts
import { describe, it, expect, jest, afterEach } from '@jest/globals';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { HydrationExtractor, extract, extractChunks } from '../extractor.js';
import { ErrorCode, HydrationError } from '../errors.js';

const push = (...args: unknown[]) =>
  `<script>self.__next_f.push(${JSON.stringify(args)})</script>`;

const fixture = readFileSync(join(__dirname, 'fixtures', 'app-router.html'), 'utf8');

describe('extract', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should reassemble chunks of one stream into a JSON value', () => {
    const html = [
      '<html><body>',
      push('chunk', 0, '{"a":1,'),
      push('chunk', 1, '"b":2}'),
      '</body></html>',
    ].join('\n');

    const report = extract(html);

    expect(report.results).toHaveLength(1);
    expect(report.results[0]).toMatchObject({
      kind: 'json',
      stream: 'chunk',
      text: '{"a":1,"b":2}',
      chunkCount: 2,
      value: { a: 1, b: 2 },
    });
    expect(report.warnings).toEqual([]);
    expect(report.failures).toEqual([]);
  });

  it('should handle a page with several kinds of payload', () => {
    const html = [
      '<script>self.__next_f = self.__next_f || [];self.__next_f.push([0])</script>',
      push(1, '{"products":[{"id":1,"price":1299.99}]}'),
      push(2, '{"user":{"id":123,'),
      push(3, 'api_key:{"token":"test-secret"}'),
      push(2, '"name":"Ada"}}'),
      push(4, "{title: 'Home', tags: ['a', 'b',],}"),
      push(5, '{"note":"say \\"hi\\"\\nbye"}'),
    ].join('\n');

    const report = extract(html);

    expect(report.results.map(r => [r.stream, r.kind])).toEqual([
      ['1', 'json'],
      ['2', 'json'],
      ['3', 'json'],
      ['4', 'js_object'],
      ['5', 'json'],
    ]);
    expect(report.results[1]).toMatchObject({
      value: { user: { id: 123, name: 'Ada' } },
      chunkCount: 2,
      positions: [html.indexOf('push([2,'), html.lastIndexOf('push([2,')],
    });
    expect(report.results[2]).toMatchObject({ identifier: 'api_key', value: { token: 'test-secret' } });
    expect(report.results[3]).toMatchObject({ value: { title: 'Home', tags: ['a', 'b'] } });
    expect(report.results[4]).toMatchObject({ value: { note: 'say "hi"\nbye' } });
    expect(report.stats).toEqual({ chunksSeen: 6, payloadsAssembled: 5, parseFailures: 0, warnings: 0 });
  });

  it('should keep valid results when some payloads cannot be parsed', () => {
    const html = [
      push(1, '{"ok":1}'),
      push(2, '{broken: json}'),
      push(3, '{"incomplete":'),
      push(4, '[1,2]'),
    ].join('');

    const report = extract(html);

    expect(report.results.map(r => r.kind)).toEqual(['json', 'unparseable', 'unparseable', 'json']);
    expect(report.failures).toEqual([
      {
        code: ErrorCode.PARSE_FAILED,
        stream: '2',
        resultIndex: 1,
        reason: "unexpected identifier 'json' at offset 9",
      },
      {
        code: ErrorCode.PARSE_FAILED,
        stream: '3',
        resultIndex: 2,
        reason: 'unexpected end of input',
      },
    ]);
    expect(report.results[2]).toMatchObject({ text: '{"incomplete":' });
    expect(report.stats).toEqual({ chunksSeen: 4, payloadsAssembled: 4, parseFailures: 2, warnings: 0 });
  });

  it('should not let a deeply nested payload abort the others', () => {
    const arrays = extract(push(1, '{"ok":1}') + push(2, '['.repeat(20000) + ']'.repeat(20000)));
    const objects = extract(push(1, '{"ok":1}') + push(2, '{a:'.repeat(20000)));

    expect(arrays.results.map(r => r.kind)).toEqual(['json', 'unparseable']);
    expect(arrays.results[0]).toMatchObject({ value: { ok: 1 } });
    expect(arrays.failures[0].reason).toBe('nesting deeper than 512 levels at offset 512');
    expect(objects.results.map(r => r.kind)).toEqual(['json', 'unparseable']);
    expect(objects.failures[0].reason).toBe('nesting deeper than 512 levels at offset 1536');
  });

  it('should record a marker nested too deeply as a warning', () => {
    const html =
      `<script>self.__next_f.push([1,${'['.repeat(600)}${']'.repeat(600)}])</script>` +
      push(2, '{"ok":1}');

    const report = extract(html);

    expect(report.results.map(r => r.stream)).toEqual(['2']);
    expect(report.warnings).toEqual([{
      code: ErrorCode.MALFORMED_MARKER,
      scanner: 'push',
      position: html.indexOf('push'),
      message: 'undecodable marker: nesting deeper than 512 levels at offset 514',
    }]);
  });

  it('should split streamed rows and search inside them', () => {
    const rows =
      '1:HL["/_next/static/css/a.css","style"]\n' +
      '0:{"product":{"price":19.99}}\n' +
      '2:["$","div",null,{"price":5}]\n';
    const extractor = new HydrationExtractor();

    const report = extractor.extract(push(1, rows.slice(0, 30)) + push(1, rows.slice(30)));

    expect(report.results).toHaveLength(1);
    expect(report.results[0]).toMatchObject({ kind: 'rows', chunkCount: 2, text: rows });
    expect(report.failures).toEqual([]);
    expect(Array.from(extractor.search(report, 'price', { deep: true }))).toEqual([
      { resultIndex: 0, item: 1, identifier: '0', path: 'product.price', value: 19.99 },
      { resultIndex: 0, item: 2, identifier: '2', path: '[3].price', value: 5 },
    ]);
    expect(Array.from(extractor.search(report, 'product'))).toEqual([
      { resultIndex: 0, item: 1, identifier: '0', path: 'product', value: { price: 19.99 } },
    ]);
    expect(Array.from(extractor.getAllKeys(report))).toEqual([['product', 1], ['price', 2]]);
  });

  it('should reproduce a value split across shuffled chunks', () => {
    const value = { page: { title: 'Catalog', items: [1, 2, 3], meta: { draft: false, score: 0.5 } } };
    const text = JSON.stringify(value);
    const parts = [text.slice(0, 10), text.slice(10, 25), text.slice(25)];
    const html = [push('p', 2, parts[2]), push('p', 0, parts[0]), push('p', 1, parts[1])].join('');

    const report = extract(html);

    expect(report.results).toHaveLength(1);
    expect(report.results[0]).toMatchObject({ kind: 'json', text, value });
  });

  it('should record duplicate chunks and keep the first one', () => {
    const html = push('s', 0, '{"a":1}') + push('s', 0, '{"a":2}');

    const report = extract(html);

    expect(report.results[0]).toMatchObject({ value: { a: 1 }, chunkCount: 1 });
    expect(report.warnings).toEqual([{
      code: ErrorCode.DUPLICATE_CHUNK,
      stream: 's',
      index: 0,
      position: html.lastIndexOf('push('),
      message: 'duplicate chunk index 0 in stream "s" discarded',
    }]);
  });

  it('should record malformed markers without failing', () => {
    const html = '<script>self.__next_f.push({"a":1})</script>' + push(1, '{}');

    const report = extract(html);

    expect(report.results).toHaveLength(1);
    expect(report.warnings).toEqual([{
      code: ErrorCode.MALFORMED_MARKER,
      scanner: 'push',
      position: html.indexOf('push'),
      message: 'expected an array argument',
    }]);
  });

  it('should return an empty report for text without markers', () => {
    const report = extract('<html><body><p>Hello</p></body></html>');

    expect(report.results).toEqual([]);
    expect(report.stats).toEqual({ chunksSeen: 0, payloadsAssembled: 0, parseFailures: 0, warnings: 0 });
  });

  it('should give the same report for the same input', () => {
    expect(extract(fixture)).toEqual(extract(fixture));
  });

  it('should read a page with a bootstrap marker and prefixed payloads', () => {
    const report = extract(fixture);

    expect(report.results.map(r => r.stream)).toEqual(['1', '2', '3']);
    expect(report.results[0]).toMatchObject({
      kind: 'json',
      chunkCount: 2,
      value: {
        products: [
          { id: 1, name: 'Desk Lamp', price: 24.5 },
          { id: 2, name: 'Chair', price: 89 },
        ],
      },
    });
    expect(report.results[1]).toMatchObject({
      kind: 'json',
      identifier: 'session',
      value: { user: { id: 42, role: 'member' } },
    });
    expect(report.results[2]).toMatchObject({
      kind: 'js_object',
      value: { theme: 'dark', flags: { beta: true } },
    });
    expect(report.stats.chunksSeen).toBe(4);
  });

  it('should combine __NEXT_DATA__ with streamed chunks in document order', () => {
    const html =
      '<script id="__NEXT_DATA__" type="application/json">{"props":{"pageProps":{"id":7}}}</script>' +
      push(1, '{"id":8}');

    const report = extract(html);

    expect(report.results.map(r => [r.stream, r.kind])).toEqual([
      ['__NEXT_DATA__', 'json'],
      ['1', 'json'],
    ]);
    expect(report.results[0].positions).toEqual([0]);
    expect(extract(html, { nextData: false }).results.map(r => r.stream)).toEqual(['1']);
  });

  it('should only accept configured receivers', () => {
    const html =
      '<script>self.__app.push([1,"{\\"a\\":1}"])</script>' +
      '<script>self.__next_f.push([2,"{\\"b\\":2}"])</script>';

    expect(extract(html).results.map(r => r.stream)).toEqual(['2']);
    expect(extract(html, { receivers: ['__app'] }).results.map(r => r.stream)).toEqual(['1']);
  });

  it('should reject input that is not a string', () => {
    expect(() => extract(undefined as unknown as string)).toThrow(HydrationError);
    expect(() => extract(null as unknown as string)).toThrow(
      'Expected HTML text as a string, received null'
    );
  });

  it('should reject receivers that are not names', () => {
    expect(() => new HydrationExtractor({ receivers: [''] })).toThrow(
      'Expected receivers to be an array of names, received array'
    );
  });

  it('should log progress when verbose', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => {});
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => {});

    new HydrationExtractor({ verbose: true }).extract(push(1, '{"ok":1}') + push(2, '{broken: json}'));

    expect(log.mock.calls).toEqual([
      ['[Scan] 2 chunks, 0 malformed markers'],
      ['[Assemble] 2 payloads'],
    ]);
    expect(warn.mock.calls).toEqual([
      ["[Parse] stream 2: unexpected identifier 'json' at offset 9 ({broken: json})"],
    ]);
  });

  it('should stay quiet by default', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => {});
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => {});

    extract(push(1, '{broken: json}'));

    expect(log).not.toHaveBeenCalled();
    expect(warn).not.toHaveBeenCalled();
  });
});

describe('extractChunks', () => {
  it('should list raw chunks in document order', () => {
    const chunks = extractChunks(fixture);

    expect(chunks.map(c => [c.stream, c.index, c.source])).toEqual([
      ['1', 0, 'push'],
      ['1', 1, 'push'],
      ['2', 0, 'push'],
      ['3', 0, 'push'],
    ]);
    expect(chunks[0].rawText).toBe('{"products":[{"id":1,"name":"Desk Lamp","price":24.5},');
  });
});

describe('HydrationExtractor queries', () => {
  const extractor = new HydrationExtractor();
  const report = extractor.extract(fixture);

  it('should search nested keys', () => {
    expect(Array.from(extractor.search(report, 'price', { deep: true }))).toEqual([
      { resultIndex: 0, path: 'products[0].price', value: 24.5 },
      { resultIndex: 0, path: 'products[1].price', value: 89 },
    ]);
  });

  it('should find keys by pattern', () => {
    expect(extractor.findDataByPattern(report, 'ROLE')).toEqual([
      { resultIndex: 1, path: 'user.role', value: 'member' },
    ]);
  });

  it('should count keys', () => {
    expect(Object.fromEntries(extractor.getAllKeys(report))).toEqual({
      products: 1,
      id: 3,
      name: 2,
      price: 2,
      user: 1,
      role: 1,
      theme: 1,
      flags: 1,
      beta: 1,
    });
  });
});
