/**
 * Sustitucion del marcador de pod en descripciones de retos.
 *
 * Es texto plano: no participa en la validacion de banderas.
 */
import { configuracion } from '../../configuracion';

/**
 * Reemplaza cada aparicion del marcador por el id de pod.
 * Sin pod resuelto el texto se devuelve intacto.
 */
export function sustituirTokensPod(texto: string, podId: number | null, marcador = configuracion.marcadorPod): string {
  if (podId === null || !texto || !marcador) return texto;
  return texto.split(marcador).join(String(podId));
}

export type VistaPreviaPod = { podId: number; descripcion: string };

export function previsualizarDescripcion(texto: string, podIds: readonly number[]): VistaPreviaPod[] {
  const unicos = Array.from(new Set(podIds));
  return unicos.map((podId) => ({ podId, descripcion: sustituirTokensPod(texto, podId) }));
}
