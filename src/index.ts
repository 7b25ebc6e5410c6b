/**
 * Script Supervisor
 *
 * Local control plane for one long-running external script: start it, stream
 * its output to any number of observers, track its lifecycle, stop it on demand.
 */

export * from './errors/error-codes';
export * from './errors/supervisor-error';
export * from './models';
export * from './process/process-handle';
export * from './stream';
export * from './supervisor';
export * from './config';
export * from './web';
export { createService } from './service';
export type { Service, ServiceOptions } from './service';
