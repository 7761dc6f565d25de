/**
 * Validaciones de banderas y envios.
 */
import { z } from 'zod';
import {
  esquemaContenidoBandera,
  esquemaIdPod,
  esquemaSensibilidad
} from '../../compartido/validaciones/esquemas';

export const esquemaCrearBandera = z.discriminatedUnion('tipo', [
  z
    .object({
      tipo: z.literal('predeterminada'),
      contenido: esquemaContenidoBandera,
      sensibilidad: esquemaSensibilidad.optional()
    })
    .strict(),
  z
    .object({
      tipo: z.literal('por_pod'),
      podId: esquemaIdPod,
      contenido: esquemaContenidoBandera,
      sensibilidad: esquemaSensibilidad.optional()
    })
    .strict()
]);

export const esquemaFilaBanderaPod = z
  .object({
    podId: esquemaIdPod.nullable().optional(),
    contenido: z.string().max(1_000).nullable().optional()
  })
  .strict();

export const esquemaCrearBanderasLote = z.object({
  banderas: z.array(esquemaFilaBanderaPod).min(1).max(500),
  sensibilidad: esquemaSensibilidad.optional()
});

// La respuesta vacia no se rechaza: se compara como cualquier otra.
export const esquemaEnviarRespuesta = z.object({
  respuesta: z.string().max(1_000).transform((valor) => valor.trim()),
  podVistaPrevia: esquemaIdPod.optional()
});
