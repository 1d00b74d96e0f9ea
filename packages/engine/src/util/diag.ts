import { createLogger } from './logger.js';

const log = createLogger('diagnostics');

export type DiagLevel = 'WARN' | 'ERROR' | 'INFO';

export interface DiagMeta {
  khz?: number;
  hz?: number;
  detail?: string;
}

export function formatDiagnostic(level: DiagLevel, component: string, message: string, meta?: DiagMeta): string {
  const lvl = level || 'WARN';
  const comp = component || 'unknown';
  const parts: string[] = [];
  parts.push(`[${lvl}]`);
  parts.push(`[${comp}]`);
  parts.push(message);
  const fields: string[] = [];
  if (meta) {
    if (typeof meta.khz === 'number') fields.push(`khz=${meta.khz}`);
    if (typeof meta.hz === 'number') fields.push(`hz=${meta.hz}`);
    if (meta.detail) fields.push(`detail=${meta.detail}`);
  }
  if (fields.length) parts.push(fields.join(', '));
  return parts.join(' ');
}

export function warn(component: string, message: string, meta?: DiagMeta): void {
  log.warn(formatDiagnostic('WARN', component, message, meta));
}

export function error(component: string, message: string, meta?: DiagMeta): void {
  log.error(formatDiagnostic('ERROR', component, message, meta));
}

export default { formatDiagnostic, warn, error };
