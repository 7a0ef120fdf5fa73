export * from './api/community';
