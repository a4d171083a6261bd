import { Router } from 'express';
import swaggerUi from 'swagger-ui-express';
import { buildOpenApiSpec } from '../swagger.js';

export function createSwaggerRoutes() {
  const router = Router();
  const spec = buildOpenApiSpec();

  router.get('/docs/openapi.json', (_req, res) => {
    res.json(spec);
  });
  router.use('/docs', swaggerUi.serve);
  router.get('/docs', swaggerUi.setup(spec, {
    customCss: '.swagger-ui .topbar { display: none }',
  }));

  return router;
}
