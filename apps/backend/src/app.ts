/**
 * Crea la app HTTP (Express) del API de banderas por pod.
 *
 * Seguridad por defecto: cabeceras, sanitizacion y rate-limit global; los
 * envios tienen ademas su propio limite por usuario (ver `rutasBanderas`).
 * Sin side-effects al importar; los colaboradores se inyectan para pruebas.
 */
import cors from 'cors';
import express from 'express';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { configuracion } from './configuracion';
import { crearDependenciasMongo, type DependenciasApp } from './dependencias';
import { crearRouterApi } from './rutas';
import { ErrorAplicacion } from './compartido/errores/errorAplicacion';
import { manejadorErrores } from './compartido/errores/manejadorErrores';
import { sanitizarMongo } from './infraestructura/seguridad/sanitizarMongo';

export function crearApp(dependencias: DependenciasApp = crearDependenciasMongo()) {
  const app = express();

  app.disable('x-powered-by');
  // Numero de saltos de proxy confiables; 0 = usar la IP del socket.
  app.set('trust proxy', configuracion.confiarProxy);

  app.use(helmet());
  app.use(cors({ origin: configuracion.corsOrigenes, credentials: true }));
  app.use(express.json({ limit: configuracion.limiteJson }));
  app.use(sanitizarMongo());
  app.use(
    rateLimit({
      windowMs: configuracion.rateLimitWindowMs,
      limit: configuracion.rateLimitLimit,
      standardHeaders: true,
      legacyHeaders: false
    })
  );

  app.use('/api', crearRouterApi(dependencias));

  app.use((_req, _res, next) => {
    next(new ErrorAplicacion('RUTA_NO_ENCONTRADA', 'Ruta no encontrada', 404));
  });
  app.use(manejadorErrores);

  return app;
}
