import swaggerJsdoc from 'swagger-jsdoc';
import { Express } from 'express';
import swaggerUi from 'swagger-ui-express';

function normalizeBaseUrl(url: string): string {
  // Swagger joins paths onto `servers[0].url`; a trailing slash causes `//path`.
  return url.trim().replace(/\/+$/, '');
}

function computeServerUrl(): string {
  const explicit = process.env.SWAGGER_SERVER_URL;
  if (explicit) return normalizeBaseUrl(explicit);
  return `http://localhost:${process.env.PORT || 5000}/api/v1`;
}

const swaggerOptions: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Section Attendance API',
      version: '1.0.0',
      description: 'Period-wise attendance capture and absentee reporting for class sections',
    },
    servers: [
      {
        url: computeServerUrl(),
        description: process.env.NODE_ENV === 'production' ? 'Production server' : 'Development server',
      },
    ],
    components: {
      securitySchemes: {
        bearerAuth: {
          type: 'http',
          scheme: 'bearer',
          bearerFormat: 'JWT',
        },
      },
    },
    security: [
      {
        bearerAuth: [],
      },
    ],
  },
  apis: ['./src/routes/**/*.ts'],
};

export const setupSwagger = (app: Express): void => {
  const spec = swaggerJsdoc(swaggerOptions);
  app.use('/docs', swaggerUi.serve, swaggerUi.setup(spec));
  app.get('/docs.json', (_req, res) => {
    res.setHeader('Content-Type', 'application/json');
    res.send(spec);
  });
};
