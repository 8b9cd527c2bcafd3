import { defineComponent, inject } from '../../../define.js';

export const routes = defineComponent({
  deps: { ping: inject<() => string>('app.handlers/ping') },
  init: ({ ping }) => ({ '/ping': ping }),
});
