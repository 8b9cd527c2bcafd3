import { defineEntity } from '../../../entities/lifecycle.js';

export const client = defineEntity([
  'shop/client',
  { table: 'client' },
  ['id', { 'primary-key?': true }, 'uuid'],
  ['name', ['string', { max: 250 }]],
  ['orders', { 'one-to-many?': true }, 'shop/order'],
]);

export const order = defineEntity([
  'shop/order',
  ['id', { 'primary-key?': true }, 'uuid'],
  ['client', { 'many-to-one?': true }, 'shop/client'],
  ['total', 'number'],
]);
