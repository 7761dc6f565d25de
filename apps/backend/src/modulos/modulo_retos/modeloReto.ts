/**
 * Modelo Reto. La descripcion puede contener el marcador de pod.
 */
import { Schema, model, models, type Model } from 'mongoose';
import type { TipoReto } from '../../compartido/tipos/dominio';

export type DocumentoReto = {
  nombre: string;
  categoria: string;
  descripcion: string;
  tipo: TipoReto;
};

const RetoSchema = new Schema<DocumentoReto>(
  {
    nombre: { type: String, required: true, trim: true },
    categoria: { type: String, required: true, trim: true },
    descripcion: { type: String, default: '' },
    tipo: { type: String, enum: ['por_pod'], default: 'por_pod' }
  },
  { timestamps: true, collection: 'retos' }
);

export const ModeloReto: Model<DocumentoReto> = models.Reto ?? model<DocumentoReto>('Reto', RetoSchema);
