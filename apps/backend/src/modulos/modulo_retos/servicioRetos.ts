/**
 * Servicio de retos por pod: alta con sus banderas y descripcion por pod.
 */
import { invocarColaborador } from '../../compartido/errores/colaboradores';
import { ErrorAplicacion } from '../../compartido/errores/errorAplicacion';
import type { Bandera, SensibilidadBandera } from '../../compartido/tipos/dominio';
import { log, logError } from '../../infraestructura/logging/logger';
import {
  normalizarFilasPod,
  type FilaBanderaPod,
  type ServicioAutoriaBanderas
} from '../modulo_banderas/servicioAutoriaBanderas';
import { resolverPodActivo, type ContextoSolicitud, type ResolvedorPod } from '../modulo_pods/resolvedorPod';
import type { AlmacenRetos, Reto } from './almacenRetos';
import { previsualizarDescripcion, sustituirTokensPod, type VistaPreviaPod } from './servicioDescripcion';

export type DatosNuevoReto = {
  nombre: string;
  categoria: string;
  descripcion?: string;
  banderaPredeterminada?: string;
  sensibilidad?: SensibilidadBandera;
  banderasPod?: FilaBanderaPod[];
};

export type DescripcionReto = {
  retoId: string;
  nombre: string;
  categoria: string;
  descripcion: string;
  podId: number | null;
};

export type DependenciasRetos = {
  almacenRetos: AlmacenRetos;
  resolvedorPod: ResolvedorPod;
  autoria: ServicioAutoriaBanderas;
};

function exigirTexto(valor: string, mensaje: string): string {
  const limpio = valor.trim();
  if (!limpio) throw new ErrorAplicacion('RETO_INVALIDO', mensaje, 400);
  return limpio;
}

export function crearServicioRetos(dependencias: DependenciasRetos) {
  const { almacenRetos, resolvedorPod, autoria } = dependencias;

  async function exigirReto(retoId: string): Promise<Reto> {
    const reto = await invocarColaborador('almacenRetos', () => almacenRetos.obtenerReto(retoId));
    if (!reto) throw new ErrorAplicacion('RETO_NO_ENCONTRADO', 'Reto no encontrado', 404);
    return reto;
  }

  async function deshacerAltaReto(retoId: string) {
    try {
      await almacenRetos.eliminarReto(retoId);
      log('warn', 'Alta de reto deshecha por fallo al crear sus banderas', { retoId });
    } catch (error) {
      logError('No se pudo deshacer el alta del reto', error, { retoId });
    }
  }

  async function crearRetoConBanderas(datos: DatosNuevoReto): Promise<{ reto: Reto; banderas: Bandera[] }> {
    const nombre = exigirTexto(datos.nombre, 'El nombre del reto es obligatorio');
    const categoria = exigirTexto(datos.categoria, 'La categoria del reto es obligatoria');
    // Se valida todo antes de escribir para no dejar retos a medias.
    const filas = normalizarFilasPod(datos.banderasPod ?? []);
    const sensibilidad = datos.sensibilidad ?? 'exacta';

    const reto = await invocarColaborador('almacenRetos', () =>
      almacenRetos.crearReto({ nombre, categoria, descripcion: datos.descripcion ?? '' })
    );

    const banderas: Bandera[] = [];
    const predeterminada = (datos.banderaPredeterminada ?? '').trim();
    try {
      if (predeterminada) {
        banderas.push(await autoria.crearBanderaPredeterminada(reto.id, { contenido: predeterminada, sensibilidad }));
      }
      banderas.push(...(await autoria.crearBanderasPodEnLote(reto.id, filas, sensibilidad)));
    } catch (error) {
      // Un reto sin sus banderas quedaria en estado invalido: se deshace el alta.
      await deshacerAltaReto(reto.id);
      throw error;
    }

    log('info', 'Reto por pod creado', { retoId: reto.id, banderas: banderas.length });
    return { reto, banderas };
  }

  async function obtenerDescripcion(retoId: string, contexto: ContextoSolicitud): Promise<DescripcionReto> {
    const reto = await exigirReto(retoId);
    const podId = await resolverPodActivo(contexto, resolvedorPod);
    return {
      retoId: reto.id,
      nombre: reto.nombre,
      categoria: reto.categoria,
      descripcion: sustituirTokensPod(reto.descripcion, podId),
      podId
    };
  }

  async function vistaPrevia(retoId: string, podIds: readonly number[]): Promise<VistaPreviaPod[]> {
    const reto = await exigirReto(retoId);
    return previsualizarDescripcion(reto.descripcion, podIds);
  }

  return { crearRetoConBanderas, obtenerDescripcion, vistaPrevia };
}

export type ServicioRetos = ReturnType<typeof crearServicioRetos>;
