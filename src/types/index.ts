export * from './estimate';
export * from './api';
