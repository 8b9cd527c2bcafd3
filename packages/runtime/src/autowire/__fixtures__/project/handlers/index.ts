import { defineComponent, inject } from '../../../define.js';

export const ping = defineComponent({
  deps: { health: inject<() => { status: string }>('app.stub-components/health-check') },
  init: ({ health }) => () => health().status,
});
