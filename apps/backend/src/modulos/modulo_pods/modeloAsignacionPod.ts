/**
 * Asignaciones de pod (solo lectura para este servicio).
 *
 * Las escribe la plataforma de laboratorios al crear equipos y pods.
 */
import { Schema, model, models, type Model } from 'mongoose';
import type { TipoTitularPod } from '../../compartido/tipos/dominio';

export type DocumentoAsignacionPod = {
  tipoTitular: TipoTitularPod;
  titularId: string;
  podId: number;
};

const AsignacionPodSchema = new Schema<DocumentoAsignacionPod>(
  {
    tipoTitular: { type: String, enum: ['equipo', 'usuario'], required: true },
    titularId: { type: String, required: true },
    podId: { type: Number, required: true, min: 0 }
  },
  { timestamps: true, collection: 'asignaciones_pod' }
);

AsignacionPodSchema.index({ tipoTitular: 1, titularId: 1 }, { unique: true });

export const ModeloAsignacionPod: Model<DocumentoAsignacionPod> =
  models.AsignacionPod ?? model<DocumentoAsignacionPod>('AsignacionPod', AsignacionPodSchema);
