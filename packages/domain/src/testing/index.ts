export { InMemoryStore } from './in-memory-store';
