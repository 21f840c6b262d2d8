/**
 * MCP Tool Module Exports
 *
 * @module tools
 */

export * from './shared.js';
export * from './curation.js';
