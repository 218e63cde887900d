/**
 * Express app: CORS, request logging, process routes and the error boundary.
 * /process takes multipart forms only; multer does the body parsing.
 */

import express from 'express';
import cors from 'cors';
import { errorHandler } from './middleware/errorHandler';
import { requestLogger } from './middleware/requestLogger';
import { processRoutes, ProcessRouteDeps } from './routes/process.routes';

export function createApp(deps: ProcessRouteDeps): express.Express {
  const app = express();

  app.use(cors({ origin: true, credentials: true, methods: ['GET', 'POST'] }));
  app.use(requestLogger);

  app.use('/', processRoutes(deps));

  app.use(errorHandler);

  return app;
}
