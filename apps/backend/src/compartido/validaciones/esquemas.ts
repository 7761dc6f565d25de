/**
 * Esquemas Zod reutilizables entre modulos.
 */
import { z } from 'zod';

export const esquemaObjectId = z.string().regex(/^[a-f\d]{24}$/i, 'Id invalido');

/** Id de pod: entero no negativo. No se aceptan cadenas ni decimales. */
export const esquemaIdPod = z
  .number()
  .int()
  .min(0)
  .max(Number.MAX_SAFE_INTEGER)
  // JSON admite `-0`; se normaliza a 0.
  .transform((valor) => valor + 0);

/** Id de pod recibido como texto (query string); solo digitos. */
export const esquemaIdPodTexto = z
  .string()
  .trim()
  .regex(/^\d+$/, 'El pod debe ser un entero no negativo')
  .transform((valor) => Number(valor))
  .pipe(esquemaIdPod);

export const esquemaContenidoBandera = z.string().trim().min(1, 'La bandera no puede estar vacia').max(1_000);

export const esquemaSensibilidad = z.enum(['exacta', 'sin_mayusculas']);
