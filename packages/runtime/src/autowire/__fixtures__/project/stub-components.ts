// Components used by the autowire and lifecycle tests

import { defineComponent, defineContribution, inject } from '../../define.js';

export type DbConnection = {
  state: 'open' | 'closed';
  ping(): string;
};

export const dbConnection = defineComponent({
  deps: {},
  init: (): DbConnection => ({ state: 'open', ping: () => 'pong' }),
  halt: (connection) => {
    connection.state = 'closed';
  },
});

export const healthCheck = defineComponent({
  deps: {},
  init: () => () => ({ status: 'ok' }),
});

// Not tagged, so never collected
export const helperLabel = 'stub components';

export const multiParentTestComponent = defineComponent({
  deps: {},
  init: (inputs) => ({ ...inputs }),
});

export const parentTestComponent = defineComponent({
  deps: {},
  init: (inputs) => ({ ...inputs }),
});

export const singleChild = defineContribution('parent-test-component', { component: 'single-child' });

export const status = defineComponent({
  deps: { db: inject<DbConnection>('db-connection') },
  init: ({ db }) => () => ({ status: 'ok', connection: db.ping() }),
});

export const test1 = defineContribution('multi-parent-test-component', { component: 'test-1' });

export const test2 = defineContribution('multi-parent-test-component', { component: 'test-2' });
