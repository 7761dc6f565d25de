/**
 * Modelo Bandera (predeterminada o por pod).
 */
import { Schema, model, models, type Model, type Types } from 'mongoose';
import type { SensibilidadBandera, TipoBandera } from '../../compartido/tipos/dominio';

export type DocumentoBandera = {
  retoId: Types.ObjectId;
  tipo: TipoBandera;
  contenido: string;
  sensibilidad: SensibilidadBandera;
  podId?: number;
};

const BanderaSchema = new Schema<DocumentoBandera>(
  {
    retoId: { type: Schema.Types.ObjectId, ref: 'Reto', required: true, index: true },
    tipo: { type: String, enum: ['predeterminada', 'por_pod'], required: true },
    contenido: { type: String, required: true, trim: true },
    sensibilidad: { type: String, enum: ['exacta', 'sin_mayusculas'], default: 'exacta' },
    // Obligatorio para `por_pod`; lo garantizan las validaciones de autoria.
    podId: {
      type: Number,
      min: 0,
      validate: { validator: (valor: unknown) => valor === undefined || Number.isInteger(valor), message: 'podId debe ser entero' }
    }
  },
  { timestamps: true, collection: 'banderas' }
);

// Un pod, una bandera por reto. El motor tolera duplicados previos a este indice.
BanderaSchema.index(
  { retoId: 1, podId: 1 },
  { unique: true, partialFilterExpression: { tipo: 'por_pod' } }
);

export const ModeloBandera: Model<DocumentoBandera> = models.Bandera ?? model<DocumentoBandera>('Bandera', BanderaSchema);
