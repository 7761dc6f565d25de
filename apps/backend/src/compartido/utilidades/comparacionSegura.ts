/**
 * Comparacion de secretos en tiempo constante.
 *
 * El tiempo depende solo de la longitud (no secreta) y nunca de la posicion
 * del primer byte distinto. No usar `===` para comparar banderas.
 */
import { timingSafeEqual } from 'node:crypto';
import type { SensibilidadBandera } from '../tipos/dominio';

export function compararTiempoConstante(esperado: string, recibido: string): boolean {
  const a = Buffer.from(esperado, 'utf8');
  const b = Buffer.from(recibido, 'utf8');
  // La longitud no se considera secreta: salir aqui no filtra contenido.
  if (a.length !== b.length) return false;
  return timingSafeEqual(a, b);
}

export function normalizarSegunSensibilidad(texto: string, sensibilidad: SensibilidadBandera): string {
  return sensibilidad === 'sin_mayusculas' ? texto.toLowerCase() : texto;
}
