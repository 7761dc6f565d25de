/**
 * Controlador de envios de banderas.
 *
 * Para el equipo, `incorrecta` y `estado_invalido` son la misma respuesta;
 * solo un admin recibe el diagnostico.
 */
import type { Response } from 'express';
import type { Veredicto } from '../../compartido/tipos/dominio';
import { obtenerPrincipal, type SolicitudSesion } from '../modulo_autenticacion/middlewareAutenticacion';
import type { ServicioValidacion } from './servicioValidacion';

const mensajes: Record<Veredicto, string> = {
  correcta: 'Respuesta correcta',
  incorrecta: 'Respuesta incorrecta',
  estado_invalido: 'Respuesta incorrecta'
};

export function crearControladorEnvios(servicio: ServicioValidacion) {
  async function enviarRespuesta(req: SolicitudSesion, res: Response) {
    const principal = obtenerPrincipal(req);
    const { respuesta, podVistaPrevia } = req.body;

    const resultado = await servicio.validar(String(req.params.retoId), respuesta, {
      principal,
      podVistaPrevia: podVistaPrevia ?? null
    });

    const correcta = resultado.veredicto === 'correcta';
    if (principal.rol === 'admin') {
      res.json({ correcta, mensaje: mensajes[resultado.veredicto], diagnostico: resultado });
      return;
    }
    res.json({ correcta, mensaje: mensajes[resultado.veredicto] });
  }

  return { enviarRespuesta };
}
