import { RequestHandler, Router } from 'express';
import { SigningController } from './controller';
import { createPrincipalMiddleware } from './principal';

export interface SigningRouterOptions {
  principalMiddleware?: RequestHandler;
  readinessCheck?: () => Promise<void>;
}

export function createRouter(controller: SigningController, options: SigningRouterOptions = {}): Router {
  const router = Router();
  const withPrincipal = options.principalMiddleware ?? createPrincipalMiddleware();

  router.get('/health', (_req, res) => {
    res.status(200).json({ success: true, service: 'signing', status: 'ok', timestamp: new Date().toISOString() });
  });

  router.get('/ready', async (_req, res) => {
    try {
      if (options.readinessCheck) {
        await options.readinessCheck();
      }

      res.status(200).json({ success: true, service: 'signing', ready: true, timestamp: new Date().toISOString() });
    } catch {
      res.status(503).json({ success: false, service: 'signing', ready: false, error: 'Dependencies not ready' });
    }
  });

  router.post('/templates', withPrincipal, controller.createTemplate.bind(controller));
  router.get('/templates', withPrincipal, controller.listTemplates.bind(controller));
  router.get('/templates/:id', withPrincipal, controller.getTemplate.bind(controller));
  router.patch('/templates/:id', withPrincipal, controller.updateTemplate.bind(controller));
  router.put('/templates/:id/fields', withPrincipal, controller.replaceFields.bind(controller));
  router.put('/templates/:id/signers', withPrincipal, controller.replaceSigners.bind(controller));
  router.delete('/templates/:id', withPrincipal, controller.deactivateTemplate.bind(controller));
  router.get('/templates/:id/audit', withPrincipal, controller.listTemplateAudit.bind(controller));

  router.post('/documents', withPrincipal, controller.createDocument.bind(controller));
  router.get('/documents/:id', withPrincipal, controller.getDocument.bind(controller));
  router.post('/documents/:id/schedule', withPrincipal, controller.scheduleDocument.bind(controller));
  router.post('/documents/:id/send', withPrincipal, controller.sendDocument.bind(controller));
  router.post('/documents/:id/cancel', withPrincipal, controller.cancelDocument.bind(controller));
  router.get('/documents/:id/final', withPrincipal, controller.getFinalDocument.bind(controller));
  router.get('/documents/:id/audit', withPrincipal, controller.listDocumentAudit.bind(controller));

  // Recipients authenticate with their access token alone.
  router.get('/sign/:token', controller.resolveSession.bind(controller));
  router.post('/sign/:token/view', controller.recordView.bind(controller));
  router.get('/sign/:token/values', controller.listSubmittedValues.bind(controller));
  router.put('/sign/:token/fields/:fieldId', controller.submitField.bind(controller));
  router.post('/sign/:token/signature', controller.signDocument.bind(controller));

  return router;
}
