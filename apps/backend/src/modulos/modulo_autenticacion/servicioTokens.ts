/**
 * Tokens JWT de sesion (los emite la plataforma de la competencia).
 */
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { configuracion } from '../../configuracion';
import type { Principal } from '../../compartido/tipos/dominio';

const esquemaPayloadSesion = z.object({
  usuarioId: z.string().min(1),
  equipoId: z.string().min(1).nullable().optional(),
  rol: z.enum(['admin', 'participante'])
});

export type TokenSesionPayload = z.infer<typeof esquemaPayloadSesion>;

export function crearTokenSesion(payload: TokenSesionPayload) {
  return jwt.sign(payload, configuracion.jwtSecreto, {
    expiresIn: configuracion.jwtExpiraHoras * 60 * 60
  });
}

export function verificarTokenSesion(token: string): Principal {
  const payload = esquemaPayloadSesion.parse(jwt.verify(token, configuracion.jwtSecreto));
  return {
    usuarioId: payload.usuarioId,
    equipoId: payload.equipoId ?? null,
    rol: payload.rol
  };
}
