export interface MachineRecord {
  id: string;
  stateValue: string;
  version: number;
  data: Record<string, unknown>;
  parentType: string | null;
  parentId: string | null;
  expiresAt: Date | null;
  updatedAt: Date;
}

export interface HistoryRecord {
  id: string;
  instanceId: string;
  fromState: string;
  toState: string;
  eventType: string;
  context: Record<string, unknown>;
  idempotencyKey: string | null;
  transitionedAt: Date;
}

export interface ExpectedRevision {
  stateValue: string;
  version: number;
}

export interface NextRevision {
  stateValue: string;
  data: Record<string, unknown>;
  expiresAt: Date | null;
}
