/**
 * Configuracion centralizada del API de banderas.
 */
import dotenv from 'dotenv';

// Dotenv v17 puede emitir logs informativos; se silencian para mantener
// pruebas y consola limpias.
dotenv.config({ quiet: true });

const puerto = Number(process.env.PUERTO_API ?? process.env.PORT ?? 4000);
const mongoUri = process.env.MONGODB_URI ?? process.env.MONGO_URI ?? '';
const entorno = process.env.NODE_ENV ?? 'development';
const limiteJson = process.env.LIMITE_JSON ?? '100kb';
const corsOrigenes = (process.env.CORS_ORIGENES ?? 'http://localhost:5173')
  .split(',')
  .map((origen) => origen.trim())
  .filter(Boolean);

function parsearNumeroSeguro(valor: unknown, porDefecto: number, { min, max }: { min?: number; max?: number } = {}) {
  if (valor === undefined || valor === null || valor === '') return porDefecto;
  const n = typeof valor === 'number' ? valor : Number(valor);
  if (!Number.isFinite(n)) return porDefecto;
  const clampedMax = typeof max === 'number' ? Math.min(max, n) : n;
  const clamped = typeof min === 'number' ? Math.max(min, clampedMax) : clampedMax;
  return clamped;
}

// En produccion el secreto JWT debe venir del entorno; las sesiones las emite
// la plataforma de la competencia con este mismo secreto.
const jwtSecreto = process.env.JWT_SECRETO ?? '';
if (entorno === 'production' && !jwtSecreto) {
  throw new Error('JWT_SECRETO es requerido en producción');
}
const jwtSecretoEfectivo = jwtSecreto || 'cambia-este-secreto';
const jwtExpiraHoras = parsearNumeroSeguro(process.env.JWT_EXPIRA_HORAS, 8, { min: 1, max: 24 * 30 });

const rateLimitWindowMs = parsearNumeroSeguro(process.env.RATE_LIMIT_WINDOW_MS, 15 * 60 * 1000, {
  min: 1_000,
  max: 24 * 60 * 60 * 1000
});
const rateLimitLimit = parsearNumeroSeguro(process.env.RATE_LIMIT_LIMIT, 300, { min: 1, max: 10_000 });

// Envios de banderas: limite propio por usuario, mas estricto que el global.
const enviosLimitePorMinuto = parsearNumeroSeguro(process.env.ENVIOS_LIMITE_POR_MINUTO, 10, { min: 1, max: 1_000 });

// Detras de un proxy inverso (p. ej. el de la plataforma) el rate limit necesita la IP real.
const confiarProxy = parsearNumeroSeguro(process.env.CONFIAR_PROXY, 0, { min: 0, max: 10 });

// Marcador que se sustituye por el id de pod en las descripciones.
const marcadorPod = (process.env.MARCADOR_POD ?? '').trim() || ':pod_id:';

export const configuracion = Object.freeze({
  puerto,
  mongoUri,
  entorno,
  limiteJson,
  corsOrigenes,
  jwtSecreto: jwtSecretoEfectivo,
  jwtExpiraHoras,
  rateLimitWindowMs,
  rateLimitLimit,
  enviosLimitePorMinuto,
  confiarProxy,
  marcadorPod
});
