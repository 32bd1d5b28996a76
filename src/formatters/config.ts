/**
 * Config rows for "config list" and the pretty view of "config inspect"
 */

import type { ConfigSummary } from '../types';
import { formatAge } from '../utils/output';
import { Template } from '../utils/template';
import type { RowKind } from './format';

function sortedLabels(labels: Record<string, string>): string[] {
  return Object.keys(labels)
    .sort()
    .map((key) => `${key}=${labels[key]}`);
}

/**
 * Template accessors for one config row
 */
export class ConfigContext {
  constructor(
    private readonly config: ConfigSummary,
    private readonly now: number
  ) {}

  ID(): string {
    return this.config.id;
  }

  Name(): string {
    return this.config.name;
  }

  CreatedAt(): string {
    return formatAge(this.config.createdAt, this.now);
  }

  UpdatedAt(): string {
    return formatAge(this.config.updatedAt, this.now);
  }

  Labels(): string {
    return sortedLabels(this.config.labels).join(',');
  }

  Label(name: unknown): string {
    return typeof name === 'string' ? this.config.labels[name] ?? '' : '';
  }
  /**
   * What `{{json .}}` and `{{.}}` print
   */
  toJSON(): Record<string, string> {
    return {
      ID: this.ID(),
      Name: this.Name(),
      CreatedAt: this.CreatedAt(),
      UpdatedAt: this.UpdatedAt(),
      Labels: this.Labels(),
    };
  }
}

export const CONFIG_ROWS: RowKind<ConfigSummary> = {
  headers: {
    ID: 'ID',
    Name: 'NAME',
    CreatedAt: 'CREATED',
    UpdatedAt: 'UPDATED',
    Labels: 'LABELS',
    Label: 'LABEL',
  },
  defaultTable: 'table {{.ID}}\t{{.Name}}\t{{.CreatedAt}}\t{{.UpdatedAt}}',
  quiet: '{{.ID}}',
  raw: 'id: {{.ID}}\nname: {{.Name}}\ncreated at: {{.CreatedAt}}\nupdated at: {{.UpdatedAt}}\n',
  rawQuiet: 'id: {{.ID}}',
  context: (config, now) => new ConfigContext(config, now),
};

const PRETTY_TEMPLATE = Template.parse(
  `ID:              {{.ID}}
Name:            {{.Name}}
{{- if .Labels }}
Labels:
{{- range $label := .Labels }}
 - {{ $label }}
{{- end }}{{ end }}
Created at:      {{.CreatedAt}}
Updated at:      {{.UpdatedAt}}
Data:
{{.Data}}`
);

/**
 * Fixed human-readable record for one config, newline terminated
 */
export function renderPrettyConfig(config: ConfigSummary, now: number = Date.now()): string {
  const record = PRETTY_TEMPLATE.execute({
    ID: config.id,
    Name: config.name,
    Labels: sortedLabels(config.labels),
    CreatedAt: formatAge(config.createdAt, now),
    UpdatedAt: formatAge(config.updatedAt, now),
    Data: config.data ? config.data.toString('utf8') : '',
  });
  return `${record}\n`;
}
