// ═══════════════════════════════════════════════════════════════════════════════
// DOCS ROUTES — Interactive API Reference
// ═══════════════════════════════════════════════════════════════════════════════
//
// Endpoints:
//   GET /openapi.json    OpenAPI 3 document
//   GET /docs            Swagger UI over /openapi.json
//   GET /redoc           ReDoc over /openapi.json
//
// Both viewers load their scripts from a CDN; the service ships no assets.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Request, type Response } from 'express';
import { API_VERSION, openAPIDocument } from './openapi.js';

export const OPENAPI_PATH = '/openapi.json';

const SWAGGER_UI_CDN = 'https://unpkg.com/swagger-ui-dist@5.11.0';
const REDOC_CDN = 'https://cdn.redoc.ly/redoc/latest/bundles/redoc.standalone.js';

function renderPage(viewer: string, head: string, body: string): string {
  return [
    '<!DOCTYPE html>',
    '<html lang="en">',
    '<head>',
    '  <meta charset="utf-8">',
    '  <meta name="viewport" content="width=device-width, initial-scale=1">',
    `  <title>${openAPIDocument.info.title} ${API_VERSION} - ${viewer}</title>`,
    head,
    '</head>',
    '<body style="margin: 0">',
    body,
    '</body>',
    '</html>',
  ].join('\n');
}

const swaggerPage = renderPage(
  'Swagger UI',
  `  <link rel="stylesheet" href="${SWAGGER_UI_CDN}/swagger-ui.css">`,
  [
    '  <div id="swagger-ui"></div>',
    `  <script src="${SWAGGER_UI_CDN}/swagger-ui-bundle.js"></script>`,
    '  <script>',
    `    SwaggerUIBundle({ url: "${OPENAPI_PATH}", dom_id: "#swagger-ui", deepLinking: true });`,
    '  </script>',
  ].join('\n')
);

const redocPage = renderPage(
  'ReDoc',
  '',
  [
    `  <redoc spec-url="${OPENAPI_PATH}"></redoc>`,
    `  <script src="${REDOC_CDN}"></script>`,
  ].join('\n')
);

export function createDocsRouter(): Router {
  const router = Router();

  router.get(OPENAPI_PATH, (_req: Request, res: Response) => {
    res.json(openAPIDocument);
  });

  router.get('/docs', (_req: Request, res: Response) => {
    res.type('html').send(swaggerPage);
  });

  router.get('/redoc', (_req: Request, res: Response) => {
    res.type('html').send(redocPage);
  });

  return router;
}
