/**
 * Strata
 *
 * A request pipeline for Node.js web applications.
 *
 * @module strata
 */

// Application
export { Application, createApp, type ApplicationOptions } from './app.ts';

export * from './http/mod.ts';
export * from './middleware/mod.ts';
export * from './config/mod.ts';
export * from './view/mod.ts';
export * from './telemetry/mod.ts';
