/**
 * Service rows for "stack services"
 */

import type { PortConfig, ReplicaStatus, ServiceSummary } from '../types';
import type { RowKind } from './format';

export interface ServiceRow {
  service: ServiceSummary;
  status?: ReplicaStatus;
  truncate: boolean;
}

const SHORT_ID_LENGTH = 12;

export function truncateId(id: string): string {
  const colon = id.indexOf(':');
  const bare = colon >= 0 ? id.slice(colon + 1) : id;
  return bare.length > SHORT_ID_LENGTH ? bare.slice(0, SHORT_ID_LENGTH) : bare;
}

/**
 * Display form of an image reference: Docker Hub prefixes dropped, and
 * the digest dropped when a tag is present
 */
export function formatImage(image: string): string {
  let display = image;
  const at = display.indexOf('@');
  if (at !== -1) {
    const named = display.slice(0, at);
    const lastSlash = named.lastIndexOf('/');
    if (named.indexOf(':', lastSlash + 1) !== -1) {
      display = named;
    }
  }
  if (display.startsWith('docker.io/library/')) return display.slice('docker.io/library/'.length);
  if (display.startsWith('docker.io/')) return display.slice('docker.io/'.length);
  return display;
}

interface PortRange {
  publishedStart: number;
  publishedEnd: number;
  targetStart: number;
  targetEnd: number;
  protocol: string;
}

function formatPortRange(range: PortRange): string {
  if (range.publishedStart === range.publishedEnd) {
    return `*:${range.publishedStart}->${range.targetStart}/${range.protocol}`;
  }
  return `*:${range.publishedStart}-${range.publishedEnd}->${range.targetStart}-${range.targetEnd}/${range.protocol}`;
}

/**
 * Ingress-published ports, with consecutive published/target pairs
 * merged into ranges ("*:8080-8081->80-81/tcp")
 */
export function formatPorts(ports: readonly PortConfig[]): string {
  const sorted = [...ports].sort((a, b) => {
    if (a.Protocol === b.Protocol) return a.PublishedPort - b.PublishedPort;
    return a.Protocol < b.Protocol ? -1 : 1;
  });

  const formatted: string[] = [];
  let current: PortRange = { publishedStart: 0, publishedEnd: 0, targetStart: 0, targetEnd: 0, protocol: '' };

  for (const port of sorted) {
    if (port.PublishMode !== 'ingress') continue;

    const isRange = current.targetEnd !== current.targetStart;
    const overlaps = port.TargetPort <= current.targetEnd;
    const startsNewRange =
      port.Protocol !== current.protocol ||
      port.PublishedPort - current.publishedEnd > 1 ||
      port.TargetPort - current.targetEnd > 1 ||
      (isRange && overlaps);

    if (startsNewRange) {
      if (current.publishedStart > 0) formatted.push(formatPortRange(current));
      current = {
        publishedStart: port.PublishedPort,
        publishedEnd: port.PublishedPort,
        targetStart: port.TargetPort,
        targetEnd: port.TargetPort,
        protocol: port.Protocol,
      };
      continue;
    }
    current.publishedEnd = port.PublishedPort;
    current.targetEnd = port.TargetPort;
  }
  if (current.publishedStart > 0) formatted.push(formatPortRange(current));

  return formatted.join(', ');
}

export function formatReplicas(status: ReplicaStatus | undefined): string {
  return status ? `${status.running}/${status.desired}` : '';
}

/**
 * Template accessors for one service row
 */
export class ServiceContext {
  constructor(private readonly row: ServiceRow) {}

  ID(): string {
    return this.row.truncate ? truncateId(this.row.service.id) : this.row.service.id;
  }

  Name(): string {
    return this.row.service.name;
  }

  Mode(): string {
    return this.row.service.mode.kind;
  }

  Replicas(): string {
    return formatReplicas(this.row.status);
  }

  Image(): string {
    return formatImage(this.row.service.image);
  }

  Ports(): string {
    return formatPorts(this.row.service.ports);
  }
  toJSON(): Record<string, string> {
    return {
      ID: this.ID(),
      Name: this.Name(),
      Mode: this.Mode(),
      Replicas: this.Replicas(),
      Image: this.Image(),
      Ports: this.Ports(),
    };
  }
}

export const SERVICE_ROWS: RowKind<ServiceRow> = {
  headers: {
    ID: 'ID',
    Name: 'NAME',
    Mode: 'MODE',
    Replicas: 'REPLICAS',
    Image: 'IMAGE',
    Ports: 'PORTS',
  },
  defaultTable: 'table {{.ID}}\t{{.Name}}\t{{.Mode}}\t{{.Replicas}}\t{{.Image}}\t{{.Ports}}',
  quiet: '{{.ID}}',
  raw: 'id: {{.ID}}\nname: {{.Name}}\nmode: {{.Mode}}\nreplicas: {{.Replicas}}\nimage: {{.Image}}\nports: {{.Ports}}\n',
  rawQuiet: 'id: {{.ID}}',
  context: (row) => new ServiceContext(row),
};
