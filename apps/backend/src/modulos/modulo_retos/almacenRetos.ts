/**
 * Almacen de retos (lectura de descripcion, alta y baja).
 */
import { isValidObjectId } from 'mongoose';
import type { TipoReto } from '../../compartido/tipos/dominio';
import { ModeloBandera } from '../modulo_banderas/modeloBandera';
import { ModeloReto } from './modeloReto';

export type Reto = {
  id: string;
  nombre: string;
  categoria: string;
  descripcion: string;
  tipo: TipoReto;
};

export type NuevoReto = Omit<Reto, 'id' | 'tipo'>;

export interface AlmacenRetos {
  obtenerReto(retoId: string): Promise<Reto | null>;
  crearReto(nuevo: NuevoReto): Promise<Reto>;
  /** Elimina el reto y sus banderas. */
  eliminarReto(retoId: string): Promise<boolean>;
}

export function crearAlmacenRetosMongo(): AlmacenRetos {
  return {
    async obtenerReto(retoId) {
      if (!isValidObjectId(retoId)) return null;
      const reto = await ModeloReto.findById(retoId).lean();
      if (!reto) return null;
      return {
        id: String(reto._id),
        nombre: reto.nombre,
        categoria: reto.categoria,
        descripcion: reto.descripcion ?? '',
        tipo: reto.tipo
      };
    },

    async crearReto(nuevo) {
      const reto = await ModeloReto.create({ ...nuevo, tipo: 'por_pod' });
      return {
        id: String(reto._id),
        nombre: reto.nombre,
        categoria: reto.categoria,
        descripcion: reto.descripcion,
        tipo: reto.tipo
      };
    },

    async eliminarReto(retoId) {
      if (!isValidObjectId(retoId)) return false;
      await ModeloBandera.deleteMany({ retoId });
      const resultado = await ModeloReto.deleteOne({ _id: retoId });
      return resultado.deletedCount > 0;
    }
  };
}
