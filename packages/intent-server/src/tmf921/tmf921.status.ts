import type { BackendIntent, BackendState } from './tmf921.types';

// Backend status vocabularies differ between TMF921 releases and the mock; keep all spellings here.
const STATUS_MAP = new Map<string, BackendState>([
  ['acknowledged', 'pending'],
  ['created', 'pending'],
  ['received', 'pending'],
  ['inprogress', 'pending'],
  ['pending', 'pending'],
  ['feasibilitychecked', 'pending'],
  ['active', 'active'],
  ['fulfilled', 'active'],
  ['compliant', 'active'],
  ['failed', 'failed'],
  ['rejected', 'failed'],
  ['degraded', 'failed'],
  ['notcompliant', 'failed'],
  ['terminated', 'terminated'],
  ['cancelled', 'terminated'],
  ['deleted', 'terminated'],
]);

export function mapBackendStatus(raw: string | undefined): BackendState | undefined {
  if (!raw) return undefined;
  const key = raw.replace(/[\s_-]/g, '').toLowerCase();
  return STATUS_MAP.get(key);
}

export function backendStatusOf(entity: BackendIntent): string | undefined {
  return entity.lifecycleStatus ?? entity.status;
}
