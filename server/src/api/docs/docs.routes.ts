import { Router } from 'express';
import swaggerUi from 'swagger-ui-express';
import type { OpenApiDocument } from './openapi';

const escapeHtml = (s: string) =>
  s.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');

export const renderRedocPage = (title: string, specUrl: string): string => `<!DOCTYPE html>
<html>
  <head>
    <title>${escapeHtml(title)} - ReDoc</title>
    <meta charset="utf-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1" />
    <style>body { margin: 0; padding: 0; }</style>
  </head>
  <body>
    <redoc spec-url="${escapeHtml(specUrl)}"></redoc>
    <script src="https://cdn.jsdelivr.net/npm/redoc@2/bundles/redoc.standalone.js"></script>
  </body>
</html>
`;

/** Public documentation: Swagger UI at /docs, ReDoc at /redoc. */
export const createDocsRouter = (document: OpenApiDocument, specUrl: string) => {
  const router = Router();
  const title = document.info.title;

  router.use('/docs', swaggerUi.serveFiles(document), swaggerUi.setup(document, { customSiteTitle: title }));
  router.get('/redoc', (req, res) => {
    res.status(200).type('html').send(renderRedocPage(title, specUrl));
  });

  return router;
};
