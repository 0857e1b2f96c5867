export type { IMemberStore, MemberRegistry } from './IMemberStore.js';
