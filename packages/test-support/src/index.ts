export * from './chat/fakes';
