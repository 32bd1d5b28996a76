import { describe, it, expect } from 'vitest';
import { expandFormat, isTableFormat, prepareFormat, renderRows, selectFormat } from '../format';
import { indentJson, renderInspectJson } from '../inspect';
import { SERVICE_ROWS, type ServiceRow } from '../service';
import { alignColumns } from '../tabwriter';

const row: ServiceRow = {
  service: { id: 'id-1', name: 'web', mode: { kind: 'replicated', replicas: 1 }, image: 'nginx', ports: [] },
  truncate: true,
};

describe('selectFormat', () => {
  it('should prefer the flag, then the config file, then the table', () => {
    expect(selectFormat('{{.ID}}', '{{.Name}}', false)).toBe('{{.ID}}');
    expect(selectFormat(undefined, '{{.Name}}', false)).toBe('{{.Name}}');
    expect(selectFormat(undefined, undefined, false)).toBe('table');
  });

  it('should ignore the config file format in quiet mode', () => {
    expect(selectFormat(undefined, '{{.Name}}', true)).toBe('table');
  });
});

describe('expandFormat', () => {
  it('should expand the table and raw keywords', () => {
    expect(expandFormat('table', SERVICE_ROWS, false)).toBe(SERVICE_ROWS.defaultTable);
    expect(expandFormat('table', SERVICE_ROWS, true)).toBe('{{.ID}}');
    expect(expandFormat('raw', SERVICE_ROWS, true)).toBe('id: {{.ID}}');
    expect(expandFormat('{{.Name}}', SERVICE_ROWS, true)).toBe('{{.Name}}');
  });

  it('should recognise table formats by prefix', () => {
    expect(isTableFormat('table {{.ID}}')).toBe(true);
    expect(isTableFormat('{{.ID}}')).toBe(false);
  });
});

describe('renderRows', () => {
  it('should render a header and align a table written with escaped tabs', () => {
    const prepared = prepareFormat('table {{.ID}}\\t{{.Name}}', SERVICE_ROWS);

    expect(renderRows(prepared, SERVICE_ROWS, [row])).toBe('ID        NAME\nid-1      web\n');
  });

  it('should render one line per row without a header otherwise', () => {
    const prepared = prepareFormat('{{.Name}}:{{.Mode}}', SERVICE_ROWS);

    expect(renderRows(prepared, SERVICE_ROWS, [row, row])).toBe('web:replicated\nweb:replicated\n');
  });
});

describe('alignColumns', () => {
  it('should pad every cell but the last to its column width', () => {
    expect(alignColumns('a\tbb\tc\nlonger-cell\tx\ty', { minWidth: 0, padding: 1 })).toBe(
      'a           bb c\nlonger-cell x  y'
    );
  });

  it('should apply the minimum width', () => {
    expect(alignColumns('ID\tNAME')).toBe('ID        NAME');
  });
});

describe('renderInspectJson', () => {
  it('should print a four-space indented array', () => {
    expect(renderInspectJson([{ value: { a: 1 } }])).toBe('[\n    {\n        "a": 1\n    }\n]\n');
  });

  it('should reject a raw payload that is not JSON', () => {
    expect(() => renderInspectJson([{ value: {}, raw: Buffer.from('not json') }])).toThrow('invalid inspect payload');
  });

  it('should keep large integers from a raw payload exactly as sent', () => {
    const raw = Buffer.from('{"Version":{"Index":12345678901234567890},"Labels":{}}');

    expect(renderInspectJson([{ value: {}, raw }])).toBe(
      '[\n    {\n        "Version": {\n            "Index": 12345678901234567890\n        },\n        "Labels": {}\n    }\n]\n'
    );
  });

  it('should print an empty list as []', () => {
    expect(renderInspectJson([])).toBe('[]\n');
  });
});

describe('indentJson', () => {
  it('should leave punctuation inside strings alone', () => {
    expect(indentJson('{"a":"x\\"{,:"}')).toBe('{\n    "a": "x\\"{,:"\n}');
  });

  it('should drop whitespace between tokens', () => {
    expect(indentJson('[ 1 ,\n 2 ]')).toBe('[\n    1,\n    2\n]');
  });
});
