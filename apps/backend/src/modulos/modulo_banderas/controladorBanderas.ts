/**
 * Controlador de autoria de banderas (solo admin).
 */
import type { Request, Response } from 'express';
import type { ServicioAutoriaBanderas } from './servicioAutoriaBanderas';

export function crearControladorBanderas(servicio: ServicioAutoriaBanderas) {
  async function listarBanderas(req: Request, res: Response) {
    const banderas = await servicio.listarBanderasDeReto(String(req.params.retoId));
    res.json({ banderas });
  }

  async function crearBandera(req: Request, res: Response) {
    const retoId = String(req.params.retoId);
    const datos = req.body;
    const bandera =
      datos.tipo === 'por_pod'
        ? await servicio.crearBanderaPod(retoId, datos)
        : await servicio.crearBanderaPredeterminada(retoId, datos);
    res.status(201).json({ bandera });
  }

  async function crearBanderasLote(req: Request, res: Response) {
    const { banderas: filas, sensibilidad } = req.body;
    const banderas = await servicio.crearBanderasPodEnLote(String(req.params.retoId), filas, sensibilidad);
    res.status(201).json({ banderas, creadas: banderas.length });
  }

  async function eliminarBandera(req: Request, res: Response) {
    await servicio.eliminarBandera(String(req.params.retoId), String(req.params.banderaId));
    res.json({ mensaje: 'Bandera eliminada' });
  }

  return { listarBanderas, crearBandera, crearBanderasLote, eliminarBandera };
}
