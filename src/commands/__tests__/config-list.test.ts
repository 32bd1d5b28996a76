import { afterEach, describe, it, expect, vi } from 'vitest';
import { FakeContext, buildConfig, runCli } from './test-helpers';

describe('config list', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should accept no arguments', async () => {
    const context = new FakeContext();

    await expect(runCli(context, ['config', 'ls', 'foo'])).rejects.toThrow('"swarmctl config list" accepts no arguments.');
    expect(context.fakeClient.listConfigs).not.toHaveBeenCalled();
  });

  it('should report a listing failure', async () => {
    const context = new FakeContext();
    context.fakeClient.listConfigs.mockRejectedValue(new Error('error listing config'));

    await expect(runCli(context, ['config', 'ls'])).rejects.toThrow('error listing config');
    expect(context.out.toString()).toBe('');
  });

  it('should reject an invalid template before any lookup', async () => {
    const context = new FakeContext();

    await expect(runCli(context, ['config', 'ls', '--format', '{{invalid format}}'])).rejects.toThrow(
      'template parsing error: function "invalid" not defined'
    );
    expect(context.fakeClient.listConfigs).not.toHaveBeenCalled();
  });

  it('should sort configs by name in code unit order', async () => {
    const context = new FakeContext();
    context.fakeClient.listConfigs.mockResolvedValue([
      buildConfig({ id: 'id-10', name: '10-foo' }),
      buildConfig({ id: 'id-1', name: '1-foo' }),
      buildConfig({ id: 'id-2', name: '2-foo' }),
    ]);

    await runCli(context, ['config', 'list', '--format', '{{.Name}}']);

    expect(context.out.toString()).toBe('1-foo\n10-foo\n2-foo\n');
  });

  it('should print only IDs in quiet mode', async () => {
    const context = new FakeContext();
    context.fakeClient.listConfigs.mockResolvedValue([
      buildConfig({ id: 'id-foo', name: 'foo' }),
      buildConfig({ id: 'id-bar', name: 'bar' }),
    ]);

    await runCli(context, ['config', 'ls', '-q']);

    expect(context.out.toString()).toBe('id-bar\nid-foo\n');
  });

  it('should ignore the config file format in quiet mode', async () => {
    const context = new FakeContext(undefined, { configs_format: '{{ .Name }}' });
    context.fakeClient.listConfigs.mockResolvedValue([buildConfig({ id: 'id-foo', name: 'foo' })]);

    await runCli(context, ['config', 'ls', '--quiet']);

    expect(context.out.toString()).toBe('id-foo\n');
  });

  it('should use the config file format when no flag is given', async () => {
    const context = new FakeContext(undefined, { configs_format: '{{ .Name }} {{ .Labels }}' });
    context.fakeClient.listConfigs.mockResolvedValue([
      buildConfig({ id: 'id-foo', name: 'foo', labels: { lbl2: 'b', lbl1: 'a' } }),
    ]);

    await runCli(context, ['config', 'ls']);

    expect(context.out.toString()).toBe('foo lbl1=a,lbl2=b\n');
  });

  it('should prefer the --format flag over the config file format', async () => {
    const context = new FakeContext(undefined, { configs_format: '{{ .ID }}' });
    context.fakeClient.listConfigs.mockResolvedValue([
      buildConfig({ id: 'id-foo', name: 'foo', labels: { lbl1: 'Label-foo' } }),
    ]);

    await runCli(context, ['config', 'ls', '--format', '{{ .Name }} {{ .Label "lbl1" }}']);

    expect(context.out.toString()).toBe('foo Label-foo\n');
  });

  it('should render the default table with ages', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-01T12:00:00Z'));
    const context = new FakeContext();
    context.fakeClient.listConfigs.mockResolvedValue([
      buildConfig({
        id: 'id-foo',
        name: 'foo',
        createdAt: '2024-01-01T10:00:00Z',
        updatedAt: '2024-01-01T11:59:30Z',
      }),
    ]);

    await runCli(context, ['config', 'ls']);

    expect(context.out.toString()).toBe(
      'ID        NAME      CREATED       UPDATED\n' +
        'id-foo    foo       2 hours ago   30 seconds ago\n'
    );
  });

  it('should pass filters through unmodified', async () => {
    const context = new FakeContext();

    await runCli(context, ['config', 'ls', '-f', 'name=foo', '--filter', 'label=lbl1=Label-bar']);

    const [filters] = context.fakeClient.listConfigs.mock.calls[0];
    expect(filters.toRecord()).toEqual({ name: ['foo'], label: ['lbl1=Label-bar'] });
  });

  it('should print only the listed columns through {{json .}}', async () => {
    const context = new FakeContext();
    context.fakeClient.listConfigs.mockResolvedValue([buildConfig({ id: 'id-foo', name: 'foo', labels: { a: 'b' } })]);

    await runCli(context, ['config', 'ls', '--format', '{{json .}}']);

    expect(context.out.toString()).toBe(
      '{"ID":"id-foo","Name":"foo","CreatedAt":"","UpdatedAt":"","Labels":"a=b"}\n'
    );
  });

  it('should print the listed columns as a map through {{.}}', async () => {
    const context = new FakeContext();
    context.fakeClient.listConfigs.mockResolvedValue([buildConfig({ id: 'id-foo', name: 'foo', labels: { a: 'b' } })]);

    await runCli(context, ['config', 'ls', '--format', '{{.}}']);

    expect(context.out.toString()).toBe('map[CreatedAt: ID:id-foo Labels:a=b Name:foo UpdatedAt:]\n');
  });

  it('should write nothing when a later row fails to render', async () => {
    const context = new FakeContext();
    context.fakeClient.listConfigs.mockResolvedValue([
      buildConfig({ id: 'id-a', name: 'a' }),
      buildConfig({ id: 'id-b', name: 'b' }),
    ]);

    await expect(
      runCli(context, ['config', 'ls', '--format', '{{if eq .Name "b"}}{{index .Name 3}}{{end}}{{.Name}}'])
    ).rejects.toThrow('template parsing error');
    expect(context.out.toString()).toBe('');
  });
});

