export const MACHINE_MODULE_OPTIONS = Symbol('MACHINE_MODULE_OPTIONS');
export const MACHINE_DB_ADAPTER = Symbol('MACHINE_DB_ADAPTER');
export const TRANSITION_EXECUTOR = Symbol('TRANSITION_EXECUTOR');

export const MACHINE_ENTITY_METADATA = 'state-machine:entity';

/** Every minute, on the minute. */
export const DEFAULT_CRON_EXPRESSION = '0 * * * * *';
export const DEFAULT_TIMEOUT_EVENT = 'TIMEOUT';
export const TIMEOUT_CRON_JOB_NAME = 'state-machine-timeout';
