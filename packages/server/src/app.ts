import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import type { Server } from 'http';
import { createModuleLogger } from 'tuya-telemetry-core';
import type { MetricExporter } from 'tuya-telemetry-core';

const logger = createModuleLogger('AppServer');

export interface AppOptions {
  exporter: MetricExporter;
  metricsPath?: string;
}

/**
 * בונה את אפליקציית ה-express עם נתיב ה-scrape.
 * scrape לא נכשל בגלל שגיאות שליפה; נתונים ישנים ו-data age שגדל הם האות לבעיה.
 */
export function createApp({ exporter, metricsPath = '/metrics' }: AppOptions): Express {
  const app = express();
  app.disable('x-powered-by');

  app.get(metricsPath, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const payload = await exporter.render();
      res.status(200).type(exporter.contentType).send(payload);
    } catch (error) {
      next(error);
    }
  });

  app.use((req: Request, res: Response) => {
    res.status(404).type('text/plain').send(`Not found. Metrics are served at ${metricsPath}\n`);
  });

  // Error handling middleware - חייב להיות האחרון
  app.use((err: Error, req: Request, res: Response, next: NextFunction) => {
    logger.error(`Error while handling ${req.method} ${req.originalUrl}:`, err);
    if (res.headersSent) {
      next(err);
      return;
    }
    res.status(500).type('text/plain').send('Internal Server Error\n');
  });

  return app;
}

/**
 * מתחיל להאזין על הפורט. נדחה אם הפורט תפוס או לא ניתן לקשירה.
 */
export function startServer(app: Express, port: number, host?: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host ?? '0.0.0.0');
    const onError = (error: Error) => {
      server.off('listening', onListening);
      reject(error);
    };
    const onListening = () => {
      server.off('error', onError);
      logger.info(`Server listening on port ${port}`);
      resolve(server);
    };
    server.once('error', onError);
    server.once('listening', onListening);
  });
}

export function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => {
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    });
  });
}
