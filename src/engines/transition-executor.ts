import { Logger } from '@nestjs/common';
import { ActionError } from '../errors/action.error';
import { ConflictError } from '../errors/conflict.error';
import { GuardRejectedError } from '../errors/guard-rejected.error';
import { IdempotencyKeyReusedError } from '../errors/idempotency-key-reused.error';
import { NoTransitionError } from '../errors/no-transition.error';
import { TimeoutError } from '../errors/timeout.error';
import { TransitionError } from '../errors/transition.error';
import type {
  FireOptions,
  FireResult,
} from '../interfaces/fire-result.interface';
import type {
  ActionInput,
  FireContext,
  MachineData,
} from '../interfaces/machine-definition.interface';
import { cloneData } from '../utils/clone-data';
import { getTimeoutExpiry } from '../utils/get-timeout-expiry';
import { KeyedLock } from '../utils/keyed-lock';
import { withTimeout } from '../utils/with-timeout';
import type { CompiledTransition } from './state-machine-definition';
import type {
  CommittedTransition,
  StateMachineInstance,
} from './state-machine-instance';

export interface TransitionExecutorOptions {
  /** Bound on guards and before-actions when a fire sets none. */
  defaultTimeoutMs?: number;
  /** Share one lock table between executors that touch the same instances. */
  locks?: KeyedLock;
}

interface PreparedTransition {
  transition: CompiledTransition;
  data: MachineData;
}

type CommitOutcome =
  | { kind: 'committed'; version: number }
  | { kind: 'duplicate'; idempotencyKey: string; previous: CommittedTransition }
  | { kind: 'conflict'; error: ConflictError };

/**
 * Runs one fire: guard selection, before-actions, the locked commit and the
 * after-actions. Runtime failures come back as `{ ok: false }` results; only
 * programming errors (a broken adapter, an illegal FSM move) are thrown.
 */
export class TransitionExecutor {
  private readonly logger = new Logger(TransitionExecutor.name);
  private readonly locks: KeyedLock;

  constructor(private readonly options: TransitionExecutorOptions = {}) {
    this.locks = options.locks ?? new KeyedLock();
  }

  async canFire(
    instance: StateMachineInstance,
    event: string,
    context: FireContext = {},
  ): Promise<boolean> {
    const fromState = instance.currentState();
    for (const candidate of instance.definition.candidates(fromState, event)) {
      const passed = await this.evaluateGuard(
        candidate,
        this.input(instance, candidate, event, context, instance.data),
      ).catch(() => false);
      if (passed) return true;
    }
    return false;
  }

  async fire(
    instance: StateMachineInstance,
    event: string,
    context: FireContext = {},
    options: FireOptions = {},
  ): Promise<FireResult> {
    const fromState = instance.currentState();
    const expectedVersion = instance.version;
    const idempotencyKey = options.idempotencyKey;

    if (idempotencyKey) {
      const previous = await instance.findCommitted(idempotencyKey);
      if (previous) {
        return this.replay(instance, event, idempotencyKey, previous);
      }
    }

    const candidates = instance.definition.candidates(fromState, event);
    if (candidates.length === 0) {
      return this.reject(
        instance,
        event,
        new NoTransitionError(instance.machineType, instance.id, fromState, event),
      );
    }

    const timeoutMs = options.timeoutMs ?? this.options.defaultTimeoutMs;
    const controller = new AbortController();
    let prepared: PreparedTransition;
    try {
      prepared = await withTimeout(
        this.prepare(instance, candidates, event, context, controller.signal),
        timeoutMs,
        controller,
        () =>
          new TimeoutError(
            instance.machineType,
            instance.id,
            fromState,
            event,
            timeoutMs ?? 0,
          ),
      );
    } catch (error) {
      if (error instanceof TransitionError) {
        return this.reject(instance, event, error);
      }
      throw error;
    }

    const outcome = await this.locks.runExclusive(instance.key, () =>
      this.commit(instance, prepared, event, context, expectedVersion, idempotencyKey),
    );

    if (outcome.kind === 'conflict') {
      return this.reject(instance, event, outcome.error);
    }
    if (outcome.kind === 'duplicate') {
      return this.replay(instance, event, outcome.idempotencyKey, outcome.previous);
    }

    const { transition } = prepared;
    this.logger.debug(
      `${instance.key}: ${transition.from} -> ${transition.to} on "${event}" (v${outcome.version})`,
    );

    const afterActionErrors = await this.runAfterActions(
      instance,
      transition,
      event,
      context,
    );

    return {
      ok: true,
      machineType: instance.machineType,
      instanceId: instance.id,
      event,
      fromState: transition.from,
      state: transition.to,
      version: outcome.version,
      duplicate: false,
      afterActionErrors,
    };
  }

  private async prepare(
    instance: StateMachineInstance,
    candidates: readonly CompiledTransition[],
    event: string,
    context: FireContext,
    signal: AbortSignal,
  ): Promise<PreparedTransition> {
    const fromState = instance.currentState();
    const evaluated: string[] = [];
    let lastGuardError: unknown;
    let selected: CompiledTransition | undefined;

    for (const candidate of candidates) {
      if (signal.aborted) break;
      evaluated.push(candidate.guard?.name ?? '<none>');
      try {
        const passed = await this.evaluateGuard(
          candidate,
          this.input(instance, candidate, event, context, instance.data, signal),
        );
        if (passed) {
          selected = candidate;
          break;
        }
      } catch (error) {
        lastGuardError = error;
      }
    }

    if (!selected) {
      throw new GuardRejectedError(
        instance.machineType,
        instance.id,
        fromState,
        event,
        evaluated,
        lastGuardError,
      );
    }

    const draft = instance.data;
    for (const action of selected.before) {
      if (signal.aborted) break;
      try {
        await action.run(
          this.input(instance, selected, event, context, draft, signal),
        );
      } catch (error) {
        throw new ActionError(
          'before',
          action.name,
          instance.machineType,
          instance.id,
          fromState,
          event,
          error,
        );
      }
    }

    return { transition: selected, data: draft };
  }

  private async commit(
    instance: StateMachineInstance,
    prepared: PreparedTransition,
    event: string,
    context: FireContext,
    expectedVersion: number,
    idempotencyKey: string | undefined,
  ): Promise<CommitOutcome> {
    const { transition, data } = prepared;

    if (idempotencyKey) {
      const previous = await instance.findCommitted(idempotencyKey);
      if (previous) {
        return { kind: 'duplicate', idempotencyKey, previous };
      }
    }

    const conflict = (): CommitOutcome => ({
      kind: 'conflict',
      error: new ConflictError(
        instance.machineType,
        instance.id,
        transition.from,
        event,
        expectedVersion,
      ),
    });

    if (
      instance.version !== expectedVersion ||
      instance.currentState() !== transition.from
    ) {
      return conflict();
    }

    if (instance.store) {
      const { adapter, tableName } = instance.store;
      const swapped = await adapter.transaction(async (tx) => {
        const won = await tx.compareAndSet(
          tableName,
          instance.id,
          { stateValue: transition.from, version: expectedVersion },
          {
            stateValue: transition.to,
            data,
            expiresAt: getTimeoutExpiry(instance.definition, transition.to),
          },
        );
        if (!won) return false;

        await tx.insertHistory(tableName, {
          instanceId: instance.id,
          fromState: transition.from,
          toState: transition.to,
          eventType: event,
          context: cloneData(context),
          idempotencyKey: idempotencyKey ?? null,
        });
        return true;
      });

      if (!swapped) {
        return conflict();
      }
    }

    const version = expectedVersion + 1;
    instance.applyCommit(transition, version, data, idempotencyKey);
    return { kind: 'committed', version };
  }

  private async runAfterActions(
    instance: StateMachineInstance,
    transition: CompiledTransition,
    event: string,
    context: FireContext,
  ): Promise<ActionError[]> {
    const errors: ActionError[] = [];

    for (const action of transition.after) {
      try {
        await action.run(
          this.input(instance, transition, event, context, instance.data),
        );
      } catch (error) {
        const actionError = new ActionError(
          'after',
          action.name,
          instance.machineType,
          instance.id,
          transition.to,
          event,
          error,
        );
        errors.push(actionError);
        this.logger.warn(actionError.message);
      }
    }

    return errors;
  }

  private async evaluateGuard(
    candidate: CompiledTransition,
    input: ActionInput,
  ): Promise<boolean> {
    if (!candidate.guard) {
      return true;
    }

    const result: unknown = await candidate.guard.run(input);
    if (typeof result !== 'boolean') {
      throw new Error(
        `Guard "${candidate.guard.name}" must return a boolean, got ${typeof result}`,
      );
    }
    return result;
  }

  private input(
    instance: StateMachineInstance,
    transition: CompiledTransition,
    event: string,
    context: FireContext,
    data: MachineData,
    signal?: AbortSignal,
  ): ActionInput {
    return {
      instance,
      event,
      context,
      data,
      fromState: transition.from,
      toState: transition.to,
      signal,
    };
  }

  /** A key answers only for the event it committed. */
  private replay(
    instance: StateMachineInstance,
    event: string,
    idempotencyKey: string,
    previous: CommittedTransition,
  ): FireResult {
    if (previous.event !== event) {
      return this.reject(
        instance,
        event,
        new IdempotencyKeyReusedError(
          instance.machineType,
          instance.id,
          instance.currentState(),
          event,
          idempotencyKey,
          previous.event,
        ),
      );
    }
    this.logger.debug(
      `${instance.key}: "${event}" already committed (${previous.fromState} -> ${previous.toState}), skipping`,
    );
    return {
      ok: true,
      machineType: instance.machineType,
      instanceId: instance.id,
      event,
      fromState: previous.fromState,
      state: instance.currentState(),
      version: instance.version,
      duplicate: true,
      afterActionErrors: [],
    };
  }

  private reject(
    instance: StateMachineInstance,
    event: string,
    error: TransitionError,
  ): FireResult {
    this.logger.debug(`${instance.key}: ${error.message}`);
    return {
      ok: false,
      machineType: instance.machineType,
      instanceId: instance.id,
      event,
      state: instance.currentState(),
      error,
    };
  }
}
