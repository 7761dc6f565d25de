/**
 * Middlewares de sesion (Bearer JWT) y de rol administrador.
 */
import type { NextFunction, Request, Response } from 'express';
import { ErrorAplicacion } from '../../compartido/errores/errorAplicacion';
import type { Principal } from '../../compartido/tipos/dominio';
import { verificarTokenSesion } from './servicioTokens';

export type SolicitudSesion = Request & { sesion?: Principal };

export function requerirSesion(req: SolicitudSesion, _res: Response, next: NextFunction) {
  const auth = req.headers.authorization ?? '';
  const [tipo, token] = auth.split(' ');

  if (tipo !== 'Bearer' || !token) {
    next(new ErrorAplicacion('NO_AUTORIZADO', 'Token requerido', 401));
    return;
  }

  try {
    req.sesion = verificarTokenSesion(token);
    next();
  } catch {
    next(new ErrorAplicacion('TOKEN_INVALIDO', 'Token invalido o expirado', 401));
  }
}

export function requerirAdmin(req: SolicitudSesion, _res: Response, next: NextFunction) {
  if (req.sesion?.rol !== 'admin') {
    next(new ErrorAplicacion('SIN_PERMISO', 'Se requiere rol de administrador', 403));
    return;
  }
  next();
}

export function obtenerPrincipal(req: SolicitudSesion): Principal {
  if (!req.sesion) {
    throw new ErrorAplicacion('NO_AUTORIZADO', 'Sesion requerida', 401);
  }
  return req.sesion;
}
