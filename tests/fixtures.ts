import type { ProductRecord } from '../src/domain/models.js';

export const makeCatalogRecords = (): ProductRecord[] => [
  {
    type: 'base',
    product_id: 'P1',
    name: 'Notebook',
    price: 5,
    quantity_available: 10,
  },
  {
    type: 'physical',
    product_id: 'P2',
    name: 'Kettle',
    price: 12.5,
    quantity_available: 3,
    weight: 1.2,
  },
  {
    type: 'digital',
    product_id: 'D1',
    name: 'Recipe eBook',
    price: 7,
    quantity_available: 100,
    download_link: 'https://downloads.test/recipes',
  },
];
