import debug from 'debug';

export const log = {
  build: debug('schemawright:build'),
  reject: debug('schemawright:reject'),
};
