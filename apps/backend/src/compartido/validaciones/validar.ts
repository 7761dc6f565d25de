/**
 * Helpers de validacion con Zod para requests.
 */
import type { NextFunction, Request, Response } from 'express';
import { ZodObject, type ZodTypeAny, type z } from 'zod';
import { ErrorAplicacion } from '../errores/errorAplicacion';

type OpcionesValidacion = {
  /** Rechaza claves no declaradas en lugar de descartarlas. */
  strict?: boolean;
};

function endurecer(schema: ZodTypeAny, opciones: OpcionesValidacion): ZodTypeAny {
  if (opciones.strict && schema instanceof ZodObject) {
    return schema.strict();
  }
  return schema;
}

export function validarCuerpo(schema: ZodTypeAny, opciones: OpcionesValidacion = {}) {
  const efectivo = endurecer(schema, opciones);
  return (req: Request, _res: Response, next: NextFunction) => {
    const resultado = efectivo.safeParse(req.body ?? {});
    if (!resultado.success) {
      next(new ErrorAplicacion('VALIDACION', 'Payload invalido', 400, resultado.error.flatten()));
      return;
    }
    req.body = resultado.data;
    next();
  };
}

/**
 * Parsea `req.query` sin reasignarlo (en Express 5 `query` es de solo lectura).
 */
export function parsearConsulta<T extends ZodTypeAny>(schema: T, req: Request): z.infer<T> {
  const resultado = schema.safeParse(req.query);
  if (!resultado.success) {
    throw new ErrorAplicacion('VALIDACION', 'Parametros invalidos', 400, resultado.error.flatten());
  }
  return resultado.data;
}
