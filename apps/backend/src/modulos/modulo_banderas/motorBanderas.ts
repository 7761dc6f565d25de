/**
 * Motor de resolucion y validacion de banderas por pod.
 *
 * Reglas:
 * - Si el pod activo tiene banderas propias, esas son las unicas candidatas
 *   (la bandera del pod reemplaza a la predeterminada, no es un respaldo).
 * - Si no hay pod activo o el pod no tiene banderas, se usan las predeterminadas.
 * - Sin candidatas el reto esta mal configurado: `estado_invalido`.
 * - Varias banderas para el mismo pod se toleran: cualquiera es valida.
 *
 * Todas las candidatas se comparan siempre y los resultados se combinan al
 * final, para que el tiempo no revele cual (ni si alguna) coincidio.
 *
 * Funciones puras y sincronas: sin I/O ni estado entre solicitudes.
 */
import { ErrorAplicacion } from '../../compartido/errores/errorAplicacion';
import type {
  Bandera,
  BanderaPod,
  BanderaPredeterminada,
  OrigenCandidatas,
  ResultadoValidacion
} from '../../compartido/tipos/dominio';
import {
  compararTiempoConstante,
  normalizarSegunSensibilidad
} from '../../compartido/utilidades/comparacionSegura';

export type ParticionBanderas = {
  porPod: Map<number, BanderaPod[]>;
  predeterminadas: BanderaPredeterminada[];
};

export type SeleccionCandidatas = {
  origen: OrigenCandidatas | null;
  candidatas: Bandera[];
};

export function esIdPodValido(valor: unknown): valor is number {
  return typeof valor === 'number' && Number.isSafeInteger(valor) && valor >= 0;
}

/**
 * Rechaza ids de pod negativos o no enteros en lugar de coercionarlos.
 */
export function validarIdPod(valor: unknown): number {
  if (!esIdPodValido(valor)) {
    throw new ErrorAplicacion('POD_INVALIDO', 'El pod debe ser un entero no negativo', 400, { pod: String(valor) });
  }
  // -0 pasa la validacion; se devuelve siempre 0.
  return valor + 0;
}

export function particionarBanderas(banderas: readonly Bandera[]): ParticionBanderas {
  const porPod = new Map<number, BanderaPod[]>();
  const predeterminadas: BanderaPredeterminada[] = [];

  for (const bandera of banderas) {
    switch (bandera.tipo) {
      case 'por_pod': {
        const grupo = porPod.get(bandera.podId) ?? [];
        grupo.push(bandera);
        porPod.set(bandera.podId, grupo);
        break;
      }
      case 'predeterminada':
        predeterminadas.push(bandera);
        break;
      default: {
        const exhaustivo: never = bandera;
        throw new Error(`Tipo de bandera no soportado: ${JSON.stringify(exhaustivo)}`);
      }
    }
  }

  return { porPod, predeterminadas };
}

export function seleccionarCandidatas(banderas: readonly Bandera[], podActivo: number | null): SeleccionCandidatas {
  const { porPod, predeterminadas } = particionarBanderas(banderas);

  if (podActivo !== null) {
    const delPod = porPod.get(podActivo) ?? [];
    if (delPod.length > 0) return { origen: 'por_pod', candidatas: delPod };
  }

  if (predeterminadas.length > 0) return { origen: 'predeterminada', candidatas: predeterminadas };
  return { origen: null, candidatas: [] };
}

/**
 * Pods con mas de una bandera en el mismo reto (inconsistencia de datos tolerada).
 */
export function podsDuplicados(banderas: readonly Bandera[]): number[] {
  const { porPod } = particionarBanderas(banderas);
  return Array.from(porPod.entries())
    .filter(([, grupo]) => grupo.length > 1)
    .map(([podId]) => podId)
    .sort((a, b) => a - b);
}

function coincideAlguna(candidatas: readonly Bandera[], textoEnviado: string): boolean {
  let coincide = false;
  for (const candidata of candidatas) {
    const esperado = normalizarSegunSensibilidad(candidata.contenido, candidata.sensibilidad);
    const recibido = normalizarSegunSensibilidad(textoEnviado, candidata.sensibilidad);
    // Se compara primero y se acumula despues: nunca se corta el recorrido.
    const resultado = compararTiempoConstante(esperado, recibido);
    coincide = resultado || coincide;
  }
  return coincide;
}

export function evaluarEnvio(
  banderas: readonly Bandera[],
  podActivo: number | null,
  textoEnviado: string
): ResultadoValidacion {
  const pod = podActivo === null ? null : validarIdPod(podActivo);
  const { origen, candidatas } = seleccionarCandidatas(banderas, pod);

  if (candidatas.length === 0) {
    return { veredicto: 'estado_invalido', origen: null, candidatas: 0, podActivo: pod };
  }

  const correcta = coincideAlguna(candidatas, textoEnviado);
  return {
    veredicto: correcta ? 'correcta' : 'incorrecta',
    origen,
    candidatas: candidatas.length,
    podActivo: pod
  };
}
