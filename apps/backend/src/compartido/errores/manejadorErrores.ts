/**
 * Middleware de manejo de errores para el API.
 *
 * Contrato:
 * - `ErrorAplicacion` se serializa tal cual (codigo/estado/detalles).
 * - Errores de parseo/casteo provocados por el cliente se normalizan a 4xx.
 * - Para errores no esperados, se registra (excepto en tests) y se devuelve 500.
 *
 * Nota: el formato del envelope de error es parte del contrato publico del API.
 */
import type { NextFunction, Request, Response } from 'express';
import { ErrorAplicacion } from './errorAplicacion';
import { logError } from '../../infraestructura/logging/logger';

type ErrorConMetadatos = { name?: unknown; status?: unknown; type?: unknown };

function leerMetadatos(error: unknown): ErrorConMetadatos {
  if (typeof error !== 'object' || error === null) return {};
  const objeto: object = error;
  const leer = (campo: string): unknown => Reflect.get(objeto, campo);
  return { name: leer('name'), status: leer('status') ?? leer('statusCode'), type: leer('type') };
}

function responder(res: Response, estado: number, codigo: string, mensaje: string, detalles?: unknown) {
  res.status(estado).json({ error: { codigo, mensaje, detalles } });
}

export function manejadorErrores(error: unknown, _req: Request, res: Response, _next: NextFunction) {
  void _next;

  if (error instanceof ErrorAplicacion) {
    responder(res, error.estadoHttp, error.codigo, error.message, error.detalles);
    return;
  }

  const { name, status, type } = leerMetadatos(error);

  // IDs malformados (CastError/BSONError) no deben terminar en 500.
  if (name === 'CastError' || name === 'BSONError' || name === 'BSONTypeError') {
    responder(res, 400, 'DATOS_INVALIDOS', 'Id invalido');
    return;
  }

  if (status === 413 || type === 'entity.too.large') {
    responder(res, 413, 'PAYLOAD_DEMASIADO_GRANDE', 'Payload demasiado grande');
    return;
  }

  if (type === 'entity.parse.failed') {
    responder(res, 400, 'DATOS_INVALIDOS', 'JSON invalido');
    return;
  }

  const entorno = process.env.NODE_ENV;
  if (entorno !== 'test') {
    logError('Error no controlado en request', error);
  }

  const exponerMensaje = entorno !== 'production';
  const mensaje = exponerMensaje && error instanceof Error ? error.message : 'Error interno';
  responder(res, 500, 'ERROR_INTERNO', mensaje);
}
