/**
 * Alta y baja de banderas por parte de administradores.
 *
 * Aqui se rechazan los pares (reto, pod) repetidos; el motor los tolera, pero
 * no depende de esta validacion.
 */
import { invocarColaborador } from '../../compartido/errores/colaboradores';
import { ErrorAplicacion } from '../../compartido/errores/errorAplicacion';
import type { Bandera, SensibilidadBandera } from '../../compartido/tipos/dominio';
import { log } from '../../infraestructura/logging/logger';
import type { AlmacenRetos } from '../modulo_retos/almacenRetos';
import type { AlmacenBanderas } from './almacenBanderas';
import { esIdPodValido, validarIdPod } from './motorBanderas';

export type FilaBanderaPod = {
  podId?: number | null;
  contenido?: string | null;
};

export type BanderaPodNormalizada = { podId: number; contenido: string };

export type DependenciasAutoria = {
  almacenBanderas: AlmacenBanderas;
  almacenRetos: AlmacenRetos;
};

function validarContenido(contenido: string): string {
  const limpio = contenido.trim();
  if (!limpio) {
    throw new ErrorAplicacion('BANDERA_VACIA', 'La bandera no puede estar vacia', 400);
  }
  return limpio;
}

/**
 * Normaliza filas capturadas en el editor: ignora filas vacias y junta todos
 * los errores (pod faltante o invalido, bandera vacia, pod repetido).
 */
export function normalizarFilasPod(filas: readonly FilaBanderaPod[]): BanderaPodNormalizada[] {
  const normalizadas: BanderaPodNormalizada[] = [];
  const errores: string[] = [];

  filas.forEach((fila, indice) => {
    const numeroFila = indice + 1;
    const contenido = (fila.contenido ?? '').trim();
    const podId = fila.podId ?? null;

    if (podId === null && !contenido) return;

    if (podId === null) {
      errores.push(`Falta el pod en la fila ${numeroFila}.`);
      return;
    }
    if (!esIdPodValido(podId)) {
      errores.push(`Pod invalido '${String(podId)}' en la fila ${numeroFila}.`);
      return;
    }
    if (!contenido) {
      errores.push(`Bandera vacia para el pod ${podId} en la fila ${numeroFila}.`);
      return;
    }
    if (normalizadas.some((item) => item.podId === podId)) {
      errores.push(`Pod ${podId} duplicado.`);
      return;
    }

    normalizadas.push({ podId, contenido });
  });

  if (errores.length > 0) {
    throw new ErrorAplicacion('FILAS_POD_INVALIDAS', 'Banderas por pod invalidas', 400, { errores });
  }
  return normalizadas;
}

export function crearServicioAutoriaBanderas(dependencias: DependenciasAutoria) {
  const { almacenBanderas, almacenRetos } = dependencias;

  async function exigirReto(retoId: string) {
    const reto = await invocarColaborador('almacenRetos', () => almacenRetos.obtenerReto(retoId));
    if (!reto) {
      throw new ErrorAplicacion('RETO_NO_ENCONTRADO', 'Reto no encontrado', 404);
    }
    return reto;
  }

  async function podsOcupados(retoId: string): Promise<Set<number>> {
    const existentes = await invocarColaborador('almacenBanderas', () => almacenBanderas.listarBanderas(retoId));
    const pods = new Set<number>();
    for (const bandera of existentes) {
      if (bandera.tipo === 'por_pod') pods.add(bandera.podId);
    }
    return pods;
  }

  async function listarBanderasDeReto(retoId: string): Promise<Bandera[]> {
    await exigirReto(retoId);
    return invocarColaborador('almacenBanderas', () => almacenBanderas.listarBanderas(retoId));
  }

  async function crearBanderaPredeterminada(
    retoId: string,
    datos: { contenido: string; sensibilidad?: SensibilidadBandera }
  ): Promise<Bandera> {
    await exigirReto(retoId);
    const contenido = validarContenido(datos.contenido);
    const bandera = await invocarColaborador('almacenBanderas', () =>
      almacenBanderas.crearBandera({
        tipo: 'predeterminada',
        retoId,
        contenido,
        sensibilidad: datos.sensibilidad ?? 'exacta'
      })
    );
    log('info', 'Bandera predeterminada creada', { retoId, banderaId: bandera.id });
    return bandera;
  }

  async function crearBanderaPod(
    retoId: string,
    datos: { podId: number; contenido: string; sensibilidad?: SensibilidadBandera }
  ): Promise<Bandera> {
    await exigirReto(retoId);
    const podId = validarIdPod(datos.podId);
    const contenido = validarContenido(datos.contenido);

    const ocupados = await podsOcupados(retoId);
    if (ocupados.has(podId)) {
      throw new ErrorAplicacion('BANDERA_DUPLICADA', 'Ya existe una bandera para ese pod en el reto', 409, { pods: [podId] });
    }

    const bandera = await invocarColaborador('almacenBanderas', () =>
      almacenBanderas.crearBandera({
        tipo: 'por_pod',
        retoId,
        contenido,
        podId,
        sensibilidad: datos.sensibilidad ?? 'exacta'
      })
    );
    log('info', 'Bandera por pod creada', { retoId, podId, banderaId: bandera.id });
    return bandera;
  }

  async function crearBanderasPodEnLote(
    retoId: string,
    filas: readonly FilaBanderaPod[],
    sensibilidad: SensibilidadBandera = 'exacta'
  ): Promise<Bandera[]> {
    await exigirReto(retoId);
    const normalizadas = normalizarFilasPod(filas);

    const ocupados = await podsOcupados(retoId);
    const repetidos = normalizadas.filter((fila) => ocupados.has(fila.podId)).map((fila) => fila.podId);
    if (repetidos.length > 0) {
      throw new ErrorAplicacion('BANDERA_DUPLICADA', 'Ya existen banderas para esos pods en el reto', 409, {
        pods: repetidos
      });
    }

    // Secuencial: el indice unico resuelve carreras, pero el orden queda estable.
    const creadas: Bandera[] = [];
    for (const fila of normalizadas) {
      const bandera = await invocarColaborador('almacenBanderas', () =>
        almacenBanderas.crearBandera({ tipo: 'por_pod', retoId, contenido: fila.contenido, podId: fila.podId, sensibilidad })
      );
      creadas.push(bandera);
    }
    if (creadas.length > 0) {
      log('info', 'Banderas por pod creadas', { retoId, pods: creadas.length });
    }
    return creadas;
  }

  async function eliminarBandera(retoId: string, banderaId: string): Promise<void> {
    await exigirReto(retoId);
    const eliminada = await invocarColaborador('almacenBanderas', () => almacenBanderas.eliminarBandera(retoId, banderaId));
    if (!eliminada) {
      throw new ErrorAplicacion('BANDERA_NO_ENCONTRADA', 'Bandera no encontrada', 404);
    }
    log('info', 'Bandera eliminada', { retoId, banderaId });
  }

  return {
    listarBanderasDeReto,
    crearBanderaPredeterminada,
    crearBanderaPod,
    crearBanderasPodEnLote,
    eliminarBandera
  };
}

export type ServicioAutoriaBanderas = ReturnType<typeof crearServicioAutoriaBanderas>;
