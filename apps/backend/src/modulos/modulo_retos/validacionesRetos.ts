/**
 * Validaciones de retos.
 */
import { z } from 'zod';
import { esquemaIdPodTexto, esquemaSensibilidad } from '../../compartido/validaciones/esquemas';
import { esquemaFilaBanderaPod } from '../modulo_banderas/validacionesBanderas';

export const esquemaCrearReto = z.object({
  nombre: z.string().trim().min(1, 'El nombre del reto es obligatorio').max(200),
  categoria: z.string().trim().min(1, 'La categoria del reto es obligatoria').max(100),
  descripcion: z.string().max(50_000).optional(),
  banderaPredeterminada: z.string().max(1_000).optional(),
  sensibilidad: esquemaSensibilidad.optional(),
  banderasPod: z.array(esquemaFilaBanderaPod).max(500).optional()
});

export const esquemaConsultaDescripcion = z.object({
  pod: esquemaIdPodTexto.optional()
});

// `?pods=1,2,3`; por defecto los pods 1 y 2, como en el editor de retos.
export const esquemaConsultaVistaPrevia = z.object({
  pods: z
    .string()
    .optional()
    .transform((valor, ctx) => {
      const partes = (valor ?? '1,2')
        .split(',')
        .map((parte) => parte.trim())
        .filter(Boolean);
      const pods: number[] = [];
      for (const parte of partes) {
        const resultado = esquemaIdPodTexto.safeParse(parte);
        if (!resultado.success) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Pod invalido '${parte}'` });
          return z.NEVER;
        }
        pods.push(resultado.data);
      }
      if (pods.length === 0 || pods.length > 50) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Se requieren entre 1 y 50 pods' });
        return z.NEVER;
      }
      return pods;
    })
});
