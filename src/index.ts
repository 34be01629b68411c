import Fastify, { type FastifyInstance, type FastifyReply } from 'fastify';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { ReservationService } from './domain/services/ReservationService.js';
import type { ReservationResult } from './domain/services/ReservationService.js';
import { JsonFileInventoryStore } from './infrastructure/stores/JsonFileInventoryStore.js';
import type { IInventoryStore } from './infrastructure/stores/IInventoryStore.js';
import { DomainError, ResourceNotFoundError } from './domain/errors/index.js';
import { describeProduct } from './domain/models.js';
import type { AddItemRequest, Product, UpdateQuantityRequest } from './domain/models.js';
import { loadConfig } from './config.js';
import type { AppConfig } from './config.js';

export interface BuildAppOptions {
  config?: AppConfig;
  store?: IInventoryStore;
}

function errorBody(error: DomainError) {
  return {
    error: {
      code: error.code,
      message: error.message,
      statusCode: error.statusCode,
    },
    timestamp: new Date().toISOString(),
  };
}

function productView(product: Readonly<Product>) {
  return { ...product, details: describeProduct(product) };
}

const productIdParams = {
  type: 'object',
  required: ['productId'],
  properties: {
    productId: { type: 'string', minLength: 1 },
  },
} as const;

export async function buildApp(options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const config = options.config ?? loadConfig();

  const app = Fastify({
    logger: {
      level: config.logLevel,
    },
  });

  await app.register(swagger, {
    openapi: {
      openapi: '3.0.0',
      info: {
        title: config.apiTitle,
        description: config.apiDescription,
        version: config.apiVersion,
      },
      servers: [
        {
          url: `http://${config.host}:${config.port}`,
          description: config.nodeEnv === 'production' ? 'Production server' : 'Development server',
        },
      ],
      tags: [
        { name: 'health', description: 'Health check endpoints' },
        { name: 'products', description: 'Catalog browsing' },
        { name: 'cart', description: 'Cart and stock reservation operations' },
      ],
      components: {
        schemas: {
          Product: {
            type: 'object',
            required: ['productId', 'name', 'price', 'availableQuantity', 'kind'],
            properties: {
              productId: { type: 'string', example: 'P100' },
              name: { type: 'string', example: 'Ceramic Mug' },
              price: { type: 'number', example: 249 },
              availableQuantity: { type: 'integer', minimum: 0, example: 40 },
              kind: { type: 'string', enum: ['base', 'physical', 'digital'] },
              weight: { type: 'number', description: 'physical products only' },
              downloadLink: { type: 'string', description: 'digital products only' },
              details: { type: 'string' },
            },
          },
          CartLine: {
            type: 'object',
            properties: {
              productId: { type: 'string' },
              name: { type: 'string' },
              unitPrice: { type: 'number' },
              quantity: { type: 'integer', minimum: 0 },
              subtotal: { type: 'number' },
            },
          },
          Cart: {
            type: 'object',
            properties: {
              items: {
                type: 'array',
                items: { $ref: '#/components/schemas/CartLine' },
              },
              total: { type: 'number' },
            },
          },
          Error: {
            type: 'object',
            properties: {
              error: {
                type: 'object',
                properties: {
                  code: { type: 'string' },
                  message: { type: 'string' },
                  statusCode: { type: 'integer' },
                },
              },
              timestamp: { type: 'string', format: 'date-time' },
            },
          },
        },
      },
    },
  });

  await app.register(swaggerUi, {
    routePrefix: '/docs',
    uiConfig: {
      docExpansion: 'list',
      deepLinking: true,
    },
  });

  await app.register(cors, {
    origin: config.corsOrigin,
  });

  // dependency injection
  const store =
    options.store ??
    new JsonFileInventoryStore({
      catalogFile: config.catalogFile,
      cartFile: config.cartFile,
    });
  const reservations = ReservationService.fromStore(store, app.log);

  const sendCart = (reply: FastifyReply, result: ReservationResult) => {
    if (!result.ok) {
      return reply.code(result.error.statusCode).send(errorBody(result.error));
    }
    return reply.code(200).send({
      data: reservations.getCart(),
      timestamp: new Date().toISOString(),
    });
  };

  app.get('/health', {
    schema: {
      tags: ['health'],
      description: 'Health check endpoint for load balancers and monitoring',
      response: {
        200: {
          type: 'object',
          properties: {
            status: { type: 'string', example: 'ok' },
            timestamp: { type: 'string', format: 'date-time' },
          },
        },
      },
    },
  }, async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  // === Product Routes ===

  app.get('/v1/products', {
    schema: {
      tags: ['products'],
      description: 'List every product with its current available stock',
    },
  }, async (_request, reply) => {
    return reply.code(200).send({
      data: reservations.listProducts().map(productView),
      timestamp: new Date().toISOString(),
    });
  });

  app.get<{
    Params: { productId: string };
  }>('/v1/products/:productId', {
    schema: {
      tags: ['products'],
      description: 'Retrieve a single product',
      params: productIdParams,
    },
  }, async (request, reply) => {
    const { productId } = request.params;
    const product = reservations.getProduct(productId);
    if (!product) throw new ResourceNotFoundError('Product', productId);

    return reply.code(200).send({
      data: productView(product),
      timestamp: new Date().toISOString(),
    });
  });

  // === Cart Routes ===

  app.get('/v1/cart', {
    schema: {
      tags: ['cart'],
      description: 'View the cart with line subtotals and grand total',
    },
  }, async (_request, reply) => {
    return reply.code(200).send({
      data: reservations.getCart(),
      timestamp: new Date().toISOString(),
    });
  });

  // Add item (reserves stock, merges with an existing line)
  app.post<{
    Body: AddItemRequest;
  }>('/v1/cart/items', {
    schema: {
      tags: ['cart'],
      description: 'Reserve stock for a product by adding it to the cart',
      body: {
        type: 'object',
        required: ['productId', 'quantity'],
        properties: {
          productId: { type: 'string', minLength: 1 },
          quantity: { type: 'integer', minimum: 1 },
        },
      },
    },
  }, async (request, reply) => {
    const { productId, quantity } = request.body;
    return sendCart(reply, reservations.addItem(productId, quantity));
  });

  // Update quantity (takes or returns the difference)
  app.patch<{
    Params: { productId: string };
    Body: UpdateQuantityRequest;
  }>('/v1/cart/items/:productId', {
    schema: {
      tags: ['cart'],
      description: 'Set the reserved quantity of a cart line',
      params: productIdParams,
      body: {
        type: 'object',
        required: ['quantity'],
        properties: {
          quantity: { type: 'integer', minimum: 0 },
        },
      },
    },
  }, async (request, reply) => {
    const { productId } = request.params;
    const { quantity } = request.body;
    return sendCart(reply, reservations.updateQuantity(productId, quantity));
  });

  // Remove item (returns the full reserved quantity to stock)
  app.delete<{
    Params: { productId: string };
  }>('/v1/cart/items/:productId', {
    schema: {
      tags: ['cart'],
      description: 'Remove a line from the cart and release its stock',
      params: productIdParams,
    },
  }, async (request, reply) => {
    const { productId } = request.params;
    return sendCart(reply, reservations.removeItem(productId));
  });

  app.post('/v1/cart/checkout', {
    schema: {
      tags: ['cart'],
      description: 'Commit reserved stock to the catalog and empty the cart',
    },
  }, async (_request, reply) => {
    const receipt = reservations.checkout();
    return reply.code(200).send({
      data: receipt,
      timestamp: new Date().toISOString(),
    });
  });

  // ============================================================================
  // Error Handler
  // ============================================================================

  app.setErrorHandler((error, _request, reply) => {
    // Domain errors already have status codes
    if (error instanceof DomainError) {
      if (error.statusCode >= 500) app.log.error(error);
      return reply.code(error.statusCode).send(errorBody(error));
    }

    // Fastify validation errors
    if (error.validation) {
      return reply.code(400).send({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Request validation failed',
          details: error.validation,
          statusCode: 400,
        },
        timestamp: new Date().toISOString(),
      });
    }

    // Log unexpected stuff
    app.log.error(error);

    // Catch-all for other errors
    return reply.code(500).send({
      error: {
        code: 'INTERNAL_SERVER_ERROR',
        message: 'An unexpected error occurred',
        statusCode: 500,
      },
      timestamp: new Date().toISOString(),
    });
  });

  return app;
}

async function start() {
  const config = loadConfig();
  const app = await buildApp({ config });

  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(`API docs: http://${config.host}:${config.port}/docs`);

    // Handle shutdown gracefully
    const signals = ['SIGINT', 'SIGTERM'];
    signals.forEach((signal) => {
      process.on(signal, () => {
        app.log.info(`${signal} received, shutting down...`);
        app.close().then(
          () => process.exit(0),
          (err: unknown) => {
            app.log.error(err, 'Error during shutdown');
            process.exit(1);
          }
        );
      });
    });
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
}

// Start if run directly
if (import.meta.url === `file://${process.argv[1]}`) {
  start().catch((err: unknown) => {
    console.error('Failed to start:', err);
    process.exit(1);
  });
}
