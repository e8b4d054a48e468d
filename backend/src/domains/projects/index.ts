/**
 * Projects domain
 *
 * @module domains/projects
 */

export * from './types';
export * from './errors';
export * from './ProjectStore';
export { InMemoryDomainStore } from './InMemoryDomainStore';
export { MSSQLDomainStore } from './MSSQLDomainStore';
export { parseDomainSeed, loadDomainSeed } from './seed';
export type { DomainSeed, DomainSeedInput } from './seed';
