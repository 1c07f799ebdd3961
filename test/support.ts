import type { JsonObject } from '~/types';
import fs from 'node:fs';
import path from 'node:path';
import { isJsonObject } from '~/utils';

export const fixturePath = (name: string): string => path.join(__dirname, 'fixtures', name);

export const readFixture = (name: string): string => fs.readFileSync(fixturePath(name), 'utf8');

export const loadStore = (): JsonObject => {
  const store: unknown = JSON.parse(readFixture('store.json'));
  if (!isJsonObject(store)) throw new Error('store.json must hold an object');
  return store;
};
