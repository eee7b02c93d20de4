import swaggerJsdoc from 'swagger-jsdoc';
import { Express } from 'express';
import swaggerUi from 'swagger-ui-express';

function normalizeBaseUrl(url: string): string {
  // Swagger joins paths onto `servers[0].url`; a trailing slash causes `//path`.
  return url.trim().replace(/\/+$/, '');
}

const serverOrigin = process.env.SWAGGER_SERVER_URL
  ? normalizeBaseUrl(process.env.SWAGGER_SERVER_URL)
  : `http://localhost:${process.env.PORT || 5000}`;

const swaggerOptions: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Placement Portal API',
      version: '1.0.0',
      description: 'Campus placement management: students, companies, applications, grade import and Excel export',
    },
    servers: [
      {
        url: serverOrigin,
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

const swaggerSpec = swaggerJsdoc(swaggerOptions);

export const setupSwagger = (app: Express): void => {
  app.use('/docs', swaggerUi.serve, swaggerUi.setup(swaggerSpec));
  app.get('/docs.json', (_req, res) => {
    res.setHeader('Content-Type', 'application/json');
    res.send(swaggerSpec);
  });
};

export default swaggerSpec;
