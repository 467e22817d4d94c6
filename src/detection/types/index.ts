export * from './DeauthEvent.js';
export * from './AlertOutcome.js';
export * from './Statistics.js';
export * from './Configuration.js';
