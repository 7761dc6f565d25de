/**
 * Rutas de retos por pod. Requieren sesion (se monta tras `requerirSesion`).
 */
import { Router } from 'express';
import { validarCuerpo } from '../../compartido/validaciones/validar';
import { requerirAdmin } from '../modulo_autenticacion/middlewareAutenticacion';
import { crearRutasBanderas, crearRutasEnvios } from '../modulo_banderas/rutasBanderas';
import type { ServicioAutoriaBanderas } from '../modulo_banderas/servicioAutoriaBanderas';
import type { ServicioValidacion } from '../modulo_banderas/servicioValidacion';
import { crearControladorRetos } from './controladorRetos';
import type { ServicioRetos } from './servicioRetos';
import { esquemaCrearReto } from './validacionesRetos';

export type ServiciosRetos = {
  retos: ServicioRetos;
  autoria: ServicioAutoriaBanderas;
  validacion: ServicioValidacion;
};

export function crearRutasRetos(servicios: ServiciosRetos) {
  const router = Router();
  const controlador = crearControladorRetos(servicios.retos);

  router.post('/', requerirAdmin, validarCuerpo(esquemaCrearReto, { strict: true }), controlador.crearReto);
  router.get('/:retoId/descripcion', controlador.obtenerDescripcion);
  router.get('/:retoId/vista-previa', requerirAdmin, controlador.vistaPrevia);
  router.use('/:retoId/banderas', requerirAdmin, crearRutasBanderas(servicios.autoria));
  router.use('/:retoId/envios', crearRutasEnvios(servicios.validacion));

  return router;
}
