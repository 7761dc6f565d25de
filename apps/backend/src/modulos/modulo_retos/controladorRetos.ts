/**
 * Controlador de retos por pod.
 */
import type { Response } from 'express';
import { parsearConsulta } from '../../compartido/validaciones/validar';
import { obtenerPrincipal, type SolicitudSesion } from '../modulo_autenticacion/middlewareAutenticacion';
import type { ServicioRetos } from './servicioRetos';
import { esquemaConsultaDescripcion, esquemaConsultaVistaPrevia } from './validacionesRetos';

export function crearControladorRetos(servicio: ServicioRetos) {
  async function crearReto(req: SolicitudSesion, res: Response) {
    const { reto, banderas } = await servicio.crearRetoConBanderas(req.body);
    res.status(201).json({ reto, banderas });
  }

  async function obtenerDescripcion(req: SolicitudSesion, res: Response) {
    const principal = obtenerPrincipal(req);
    const { pod } = parsearConsulta(esquemaConsultaDescripcion, req);
    const descripcion = await servicio.obtenerDescripcion(String(req.params.retoId), {
      principal,
      podVistaPrevia: pod ?? null
    });
    res.json(descripcion);
  }

  async function vistaPrevia(req: SolicitudSesion, res: Response) {
    const { pods } = parsearConsulta(esquemaConsultaVistaPrevia, req);
    const vistas = await servicio.vistaPrevia(String(req.params.retoId), pods);
    res.json({ vistas });
  }

  return { crearReto, obtenerDescripcion, vistaPrevia };
}
