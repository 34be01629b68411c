export interface AppConfig {
  port: number;
  host: string;
  logLevel: string;
  nodeEnv: string;
  catalogFile: string;
  cartFile: string;
  corsOrigin: string[] | true;
  apiTitle: string;
  apiVersion: string;
  apiDescription: string;
}

type Env = Record<string, string | undefined>;

function intFrom(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    port: intFrom(env.PORT, 3000),
    host: env.HOST || '0.0.0.0',
    logLevel: env.LOG_LEVEL || 'info',
    nodeEnv: env.NODE_ENV || 'development',
    catalogFile: env.CATALOG_FILE || 'data/products.json',
    cartFile: env.CART_FILE || 'data/cart.json',
    corsOrigin: env.CORS_ORIGIN ? env.CORS_ORIGIN.split(',') : true,
    apiTitle: env.API_TITLE || 'Inventory Cart API',
    apiVersion: env.API_VERSION || '1.0.0',
    apiDescription:
      env.API_DESCRIPTION ||
      'Product catalog and shopping cart with stock reservation',
  };
}
