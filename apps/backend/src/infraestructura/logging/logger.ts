/**
 * Logging estructurado (una linea JSON por evento).
 *
 * Los veredictos de envios se registran como eventos de auditoria: es el unico
 * lugar donde se distingue `incorrecta` de `estado_invalido`.
 */
export type NivelLog = 'info' | 'warn' | 'error' | 'ok' | 'system';

type Meta = Record<string, unknown>;

const servicio = 'api-banderas';

// 'silencio' apaga todo; util en scripts y pruebas ruidosas.
const prioridades: Record<NivelLog, number> = { system: 0, info: 1, ok: 1, warn: 2, error: 3 };

function esNivelLog(valor: string): valor is NivelLog {
  return Object.prototype.hasOwnProperty.call(prioridades, valor);
}

function nivelMinimo(): number {
  const valor = (process.env.LOG_NIVEL ?? '').trim().toLowerCase();
  if (valor === 'silencio') return Number.POSITIVE_INFINITY;
  if (esNivelLog(valor)) return prioridades[valor];
  return 0;
}

function serializarError(error: unknown) {
  if (!error) return undefined;
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack
    };
  }
  return { value: String(error) };
}

export function log(level: NivelLog, msg: string, meta: Meta = {}) {
  if (prioridades[level] < nivelMinimo()) return;

  const line = JSON.stringify({
    ts: new Date().toISOString(),
    service: servicio,
    level,
    msg,
    ...meta
  });
  if (level === 'error') console.error(line);
  else if (level === 'warn') console.warn(line);
  else console.log(line);
}

export function logError(msg: string, error?: unknown, meta: Meta = {}) {
  log('error', msg, { ...meta, error: serializarError(error) });
}

export function logAuditoria(evento: string, meta: Meta = {}) {
  log('info', evento, { ...meta, auditoria: true });
}
