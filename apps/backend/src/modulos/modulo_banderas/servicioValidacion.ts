/**
 * Punto de entrada publico de la validacion de envios.
 *
 * Orquesta colaboradores (retos, pods, banderas) y delega la decision al motor.
 * Traducir el veredicto a HTTP y guardar el intento es tarea del llamador.
 */
import { invocarColaborador } from '../../compartido/errores/colaboradores';
import { ErrorAplicacion } from '../../compartido/errores/errorAplicacion';
import type { ResultadoValidacion } from '../../compartido/tipos/dominio';
import { log, logAuditoria } from '../../infraestructura/logging/logger';
import type { AlmacenRetos } from '../modulo_retos/almacenRetos';
import { resolverPodActivo, type ContextoSolicitud, type ResolvedorPod } from '../modulo_pods/resolvedorPod';
import type { AlmacenBanderas } from './almacenBanderas';
import { evaluarEnvio, podsDuplicados } from './motorBanderas';

export type DependenciasValidacion = {
  almacenBanderas: AlmacenBanderas;
  almacenRetos: AlmacenRetos;
  resolvedorPod: ResolvedorPod;
};

export type ServicioValidacion = {
  validar(retoId: string, textoEnviado: string, contexto: ContextoSolicitud): Promise<ResultadoValidacion>;
};

export function crearServicioValidacion(dependencias: DependenciasValidacion): ServicioValidacion {
  const { almacenBanderas, almacenRetos, resolvedorPod } = dependencias;

  async function validar(retoId: string, textoEnviado: string, contexto: ContextoSolicitud) {
    const reto = await invocarColaborador('almacenRetos', () => almacenRetos.obtenerReto(retoId));
    if (!reto) {
      throw new ErrorAplicacion('RETO_NO_ENCONTRADO', 'Reto no encontrado', 404);
    }

    const podActivo = await resolverPodActivo(contexto, resolvedorPod);
    const banderas = await invocarColaborador('almacenBanderas', () => almacenBanderas.listarBanderas(retoId));

    const duplicados = podsDuplicados(banderas);
    if (duplicados.length > 0) {
      log('warn', 'Reto con varias banderas para el mismo pod', { retoId, pods: duplicados });
    }

    const resultado = evaluarEnvio(banderas, podActivo, textoEnviado);

    // Solo aqui se distingue `incorrecta` de `estado_invalido`.
    logAuditoria('Envio evaluado', {
      retoId,
      usuarioId: contexto.principal.usuarioId,
      equipoId: contexto.principal.equipoId,
      rol: contexto.principal.rol,
      vistaPrevia: contexto.podVistaPrevia !== null,
      ...resultado
    });

    return resultado;
  }

  return { validar };
}
