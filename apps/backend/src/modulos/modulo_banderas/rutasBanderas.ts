/**
 * Rutas de banderas (`/retos/:retoId/banderas`) y envios (`/retos/:retoId/envios`).
 */
import { Router } from 'express';
import rateLimit from 'express-rate-limit';
import { configuracion } from '../../configuracion';
import { validarCuerpo } from '../../compartido/validaciones/validar';
import type { SolicitudSesion } from '../modulo_autenticacion/middlewareAutenticacion';
import { crearControladorBanderas } from './controladorBanderas';
import { crearControladorEnvios } from './controladorEnvios';
import type { ServicioAutoriaBanderas } from './servicioAutoriaBanderas';
import type { ServicioValidacion } from './servicioValidacion';
import { esquemaCrearBandera, esquemaCrearBanderasLote, esquemaEnviarRespuesta } from './validacionesBanderas';

export function crearRutasBanderas(servicio: ServicioAutoriaBanderas) {
  const router = Router({ mergeParams: true });
  const controlador = crearControladorBanderas(servicio);

  router.get('/', controlador.listarBanderas);
  router.post('/', validarCuerpo(esquemaCrearBandera), controlador.crearBandera);
  router.post('/lote', validarCuerpo(esquemaCrearBanderasLote, { strict: true }), controlador.crearBanderasLote);
  router.post('/:banderaId/eliminar', controlador.eliminarBandera);

  return router;
}

export function crearRutasEnvios(servicio: ServicioValidacion) {
  const router = Router({ mergeParams: true });
  const controlador = crearControladorEnvios(servicio);

  // Limite por usuario: frena fuerza bruta sin afectar a otros equipos tras la misma IP.
  const limitadorEnvios = rateLimit({
    windowMs: 60 * 1000,
    limit: configuracion.enviosLimitePorMinuto,
    standardHeaders: true,
    legacyHeaders: false,
    keyGenerator: (req: SolicitudSesion) => `usuario:${req.sesion?.usuarioId ?? 'anonimo'}`,
    handler: (_req, res) => {
      res.status(429).json({ error: { codigo: 'DEMASIADOS_ENVIOS', mensaje: 'Demasiados envios; espera un momento' } });
    }
  });

  router.post('/', limitadorEnvios, validarCuerpo(esquemaEnviarRespuesta, { strict: true }), controlador.enviarRespuesta);

  return router;
}
