/**
 * Almacen de banderas: contrato que consume el motor y su implementacion Mongo.
 *
 * El almacen devuelve todas las banderas del reto sin filtrar; la seleccion
 * por pod es responsabilidad del motor.
 */
import { isValidObjectId } from 'mongoose';
import { ErrorAplicacion } from '../../compartido/errores/errorAplicacion';
import type { Bandera, SensibilidadBandera } from '../../compartido/tipos/dominio';
import { log } from '../../infraestructura/logging/logger';
import { esIdPodValido } from './motorBanderas';
import { ModeloBandera } from './modeloBandera';

export type NuevaBandera =
  | { tipo: 'predeterminada'; retoId: string; contenido: string; sensibilidad: SensibilidadBandera }
  | { tipo: 'por_pod'; retoId: string; contenido: string; sensibilidad: SensibilidadBandera; podId: number };

export interface AlmacenBanderas {
  listarBanderas(retoId: string): Promise<Bandera[]>;
  crearBandera(nueva: NuevaBandera): Promise<Bandera>;
  eliminarBandera(retoId: string, banderaId: string): Promise<boolean>;
}

/** Forma minima de un documento leido con `.lean()` o `toObject()`. */
export type DocumentoBanderaPlano = {
  _id: unknown;
  retoId?: unknown;
  tipo?: unknown;
  contenido?: unknown;
  sensibilidad?: unknown;
  podId?: unknown;
};

/**
 * Convierte un documento persistido en la variante de dominio.
 * Devuelve null (y registra) si el documento no cumple el contrato.
 */
export function aBandera(documento: DocumentoBanderaPlano): Bandera | null {
  const id = String(documento._id);
  const retoId = String(documento.retoId ?? '');
  const contenido = typeof documento.contenido === 'string' ? documento.contenido : '';
  const sensibilidad: SensibilidadBandera = documento.sensibilidad === 'sin_mayusculas' ? 'sin_mayusculas' : 'exacta';

  if (!contenido) {
    log('warn', 'Bandera sin contenido; se ignora', { banderaId: id, retoId });
    return null;
  }

  if (documento.tipo === 'predeterminada') {
    return { id, retoId, tipo: 'predeterminada', contenido, sensibilidad };
  }

  if (documento.tipo === 'por_pod') {
    if (!esIdPodValido(documento.podId)) {
      log('warn', 'Bandera por pod con podId invalido; se ignora', {
        banderaId: id,
        retoId,
        podId: String(documento.podId)
      });
      return null;
    }
    return { id, retoId, tipo: 'por_pod', contenido, sensibilidad, podId: documento.podId };
  }

  log('warn', 'Bandera con tipo desconocido; se ignora', { banderaId: id, retoId, tipo: String(documento.tipo) });
  return null;
}

function esClaveDuplicada(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 11000;
}

export function crearAlmacenBanderasMongo(): AlmacenBanderas {
  return {
    async listarBanderas(retoId) {
      if (!isValidObjectId(retoId)) return [];
      const documentos = await ModeloBandera.find({ retoId }).sort({ createdAt: 1, _id: 1 }).lean();
      return documentos.flatMap((documento) => {
        const bandera = aBandera(documento);
        return bandera ? [bandera] : [];
      });
    },

    async crearBandera(nueva) {
      try {
        const documento = await ModeloBandera.create(nueva);
        const bandera = aBandera(documento.toObject());
        if (!bandera) {
          throw new ErrorAplicacion('BANDERA_INVALIDA', 'La bandera guardada no es valida', 500);
        }
        return bandera;
      } catch (error) {
        if (esClaveDuplicada(error)) {
          throw new ErrorAplicacion('BANDERA_DUPLICADA', 'Ya existe una bandera para ese pod en el reto', 409);
        }
        throw error;
      }
    },

    async eliminarBandera(retoId, banderaId) {
      if (!isValidObjectId(retoId) || !isValidObjectId(banderaId)) return false;
      const resultado = await ModeloBandera.deleteOne({ _id: banderaId, retoId });
      return resultado.deletedCount > 0;
    }
  };
}
