/**
 * Resolucion del pod activo de una solicitud.
 *
 * - `ResolvedorPod`: asignacion persistente equipo/usuario -> pod.
 * - `resolverOverrideVistaPrevia`: pod elegido por un admin para previsualizar
 *   o validar como si fuera ese pod, solo durante la solicitud actual.
 */
import { invocarColaborador } from '../../compartido/errores/colaboradores';
import { ErrorAplicacion } from '../../compartido/errores/errorAplicacion';
import type { Principal, TipoTitularPod } from '../../compartido/tipos/dominio';
import { log } from '../../infraestructura/logging/logger';
import { esIdPodValido, validarIdPod } from '../modulo_banderas/motorBanderas';
import { ModeloAsignacionPod } from './modeloAsignacionPod';

export interface ResolvedorPod {
  /** null = sin pod asignado. */
  resolverPod(principal: Principal): Promise<number | null>;
}

export type ContextoSolicitud = {
  principal: Principal;
  /** Pod solicitado para vista previa; ya validado en el borde HTTP. */
  podVistaPrevia: number | null;
};

export function resolverOverrideVistaPrevia(contexto: ContextoSolicitud): number | null {
  if (contexto.podVistaPrevia === null) return null;
  if (contexto.principal.rol !== 'admin') {
    throw new ErrorAplicacion('SIN_PERMISO', 'Solo un administrador puede elegir el pod', 403);
  }
  return validarIdPod(contexto.podVistaPrevia);
}

/**
 * Pod con el que se atiende la solicitud: el override de vista previa (admin)
 * tiene prioridad sobre la asignacion del principal.
 */
export async function resolverPodActivo(contexto: ContextoSolicitud, resolvedor: ResolvedorPod): Promise<number | null> {
  const override = resolverOverrideVistaPrevia(contexto);
  if (override !== null) return override;

  return invocarColaborador('resolvedorPod', async () => {
    const podId = await resolvedor.resolverPod(contexto.principal);
    if (podId !== null && !esIdPodValido(podId)) {
      throw new Error(`El resolvedor devolvio un pod invalido: ${String(podId)}`);
    }
    return podId;
  });
}

export function crearResolvedorPodMongo(): ResolvedorPod {
  return {
    async resolverPod(principal) {
      // Modo equipos: el pod es del equipo. Sin equipo, se busca por usuario.
      const filtro: { tipoTitular: TipoTitularPod; titularId: string } = principal.equipoId
        ? { tipoTitular: 'equipo', titularId: principal.equipoId }
        : { tipoTitular: 'usuario', titularId: principal.usuarioId };

      const asignacion = await ModeloAsignacionPod.findOne(filtro).lean();
      if (!asignacion) return null;

      if (!esIdPodValido(asignacion.podId)) {
        log('warn', 'Asignacion de pod invalida; se trata como sin pod', { ...filtro, podId: String(asignacion.podId) });
        return null;
      }
      return asignacion.podId;
    }
  };
}
