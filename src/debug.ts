import debug from 'debug';

export const log = Object.assign(debug('json-keywords'), {
  schema: debug('json-keywords:schema'),
  query: debug('json-keywords:query'),
  keyword: debug('json-keywords:keyword')
});
