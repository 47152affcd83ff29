import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import swaggerUi from 'swagger-ui-express';
import mainRouter from './routes/index';
import diagnosticsRoutes from './routes/diagnostics.routes';
import { errorHandler } from './middlewares/errorHandler';
import { swaggerSpec } from './config/swagger';

const app: Express = express();

// Middlewares
// Reflect the caller's origin so credentialed requests from any origin are allowed.
app.use(cors({ origin: true, credentials: true }));
app.use(express.json());

// Swagger UI route
app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(swaggerSpec, {
  customCss: '.swagger-ui .topbar { display: none }',
  customSiteTitle: 'UMKM & Attendance API Documentation'
}));

// Routes
app.use('/', diagnosticsRoutes);
app.use('/api', mainRouter);

// Not found handler (should be after all routes)
app.use((req: Request, res: Response, next: NextFunction) => {
  res.status(404).json({ detail: 'Not Found' });
});

// Global error handler (should be the last middleware)
app.use(errorHandler);

export { app };
