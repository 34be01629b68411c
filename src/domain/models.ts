export type ProductKind = 'base' | 'physical' | 'digital';

interface ProductFields {
  readonly productId: string;
  readonly name: string;
  readonly price: number;
  // only Catalog writes this, through setAvailableQuantity
  availableQuantity: number;
}

export interface BaseProduct extends ProductFields {
  readonly kind: 'base';
}

export interface PhysicalProduct extends ProductFields {
  readonly kind: 'physical';
  readonly weight: number;
}

export interface DigitalProduct extends ProductFields {
  readonly kind: 'digital';
  readonly downloadLink: string;
}

export type Product = BaseProduct | PhysicalProduct | DigitalProduct;

// a cart line; product is the same instance the Catalog holds
export interface CartEntry {
  readonly product: Readonly<Product>;
  reservedQuantity: number;
}

// === Persisted shapes (snake_case, as stored on disk) ===

export interface ProductRecord {
  type: ProductKind;
  product_id: string;
  name: string;
  price: number;
  quantity_available: number;
  weight?: number;
  download_link?: string;
}

export interface CartRecord {
  product_id: string;
  quantity: number;
}

// === API shapes ===

export interface AddItemRequest {
  productId: string;
  quantity: number;
}

export interface UpdateQuantityRequest {
  quantity: number;
}

export interface CartLineView {
  productId: string;
  name: string;
  unitPrice: number;
  quantity: number;
  subtotal: number;
}

export interface CartView {
  items: CartLineView[];
  total: number;
}

export interface Receipt {
  receiptId: string;
  items: CartLineView[];
  total: number;
  checkedOutAt: Date;
}

export function setAvailableQuantity(product: Product, value: number): void {
  product.availableQuantity = Math.max(0, value);
}

export function setReservedQuantity(entry: CartEntry, value: number): void {
  entry.reservedQuantity = Math.max(0, value);
}

export function entrySubtotal(entry: CartEntry): number {
  return entry.product.price * entry.reservedQuantity;
}

// rounding to 2 decimals for display only
export function roundCurrency(amount: number): number {
  return Math.round(amount * 100) / 100;
}

export function describeProduct(product: Readonly<Product>): string {
  const head = `${product.productId} | ${product.name} | ₹${product.price}`;

  switch (product.kind) {
    case 'physical':
      return `${head} | Stock: ${product.availableQuantity} | Weight: ${product.weight}kg`;
    case 'digital':
      return `${head} | Download: ${product.downloadLink}`;
    case 'base':
      return `${head} | Stock: ${product.availableQuantity}`;
  }
}

export function describeEntry(entry: CartEntry): string {
  const { product, reservedQuantity } = entry;
  return `Item: ${product.name}, Qty: ${reservedQuantity}, Price: ₹${product.price}, Subtotal: ₹${entrySubtotal(entry).toFixed(2)}`;
}

export function toLineView(entry: CartEntry): CartLineView {
  return {
    productId: entry.product.productId,
    name: entry.product.name,
    unitPrice: entry.product.price,
    quantity: entry.reservedQuantity,
    subtotal: roundCurrency(entrySubtotal(entry)),
  };
}
