import { KeywordLibrary } from '~/index';

const library = new KeywordLibrary();

const catalog = JSON.stringify({
  shelf: {
    item: [
      { kind: 'tool', name: 'Hammer', price: 12.5 },
      { kind: 'tool', name: 'Wrench', price: 8 },
      { kind: 'toy', name: 'Kite', price: 20, color: 'yellow' }
    ]
  }
});

// JSONPath
console.log(library.getElements(catalog, '$.shelf.item[*].name'));
// => [ 'Hammer', 'Wrench', 'Kite' ]

console.log(library.getElements(catalog, '$.shelf.item[?(@.price < 10)].name'));
// => [ 'Wrench' ]

// JSONSelect
console.log(library.getElements(catalog, '.name:contains("Kite") ~ .price'));
// => [ 20 ]

library.elementShouldExist(catalog, '.kind:val("toy")');
library.elementShouldNotExist(catalog, '.kind:val("food")');

// Keyword-runner interface
console.log(library.runKeyword('Update Json', [catalog, '$.shelf.item[2].color', 'red']));
