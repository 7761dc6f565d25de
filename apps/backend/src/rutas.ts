/**
 * Router principal del API.
 */
import { Router } from 'express';
import { crearRutasSalud } from './compartido/salud/rutasSalud';
import type { DependenciasApp } from './dependencias';
import { requerirSesion } from './modulos/modulo_autenticacion/middlewareAutenticacion';
import { crearServicioAutoriaBanderas } from './modulos/modulo_banderas/servicioAutoriaBanderas';
import { crearServicioValidacion } from './modulos/modulo_banderas/servicioValidacion';
import { crearRutasRetos } from './modulos/modulo_retos/rutasRetos';
import { crearServicioRetos } from './modulos/modulo_retos/servicioRetos';

export function crearRouterApi(dependencias: DependenciasApp) {
  const router = Router();

  const autoria = crearServicioAutoriaBanderas(dependencias);
  const validacion = crearServicioValidacion(dependencias);
  const retos = crearServicioRetos({ ...dependencias, autoria });

  router.use('/salud', crearRutasSalud());

  router.use(requerirSesion);
  router.use('/retos', crearRutasRetos({ retos, autoria, validacion }));

  return router;
}
