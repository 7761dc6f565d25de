import { afterAll, afterEach, beforeAll, vi } from 'vitest';

type OpcionesEndurecimiento = {
  /** Permite console.warn/error sin fallar (tambien con `PERMITIR_CONSOLA_TEST=1`). */
  permitirConsola?: boolean;

  /** Mensajes de consola tolerados (subcadena o regex). */
  patronesConsolaPermitidos?: Array<string | RegExp>;

  /** Permite warnings de Node (DeprecationWarning, etc.). */
  permitirAvisosNode?: boolean;
};

function coincideAlguno(texto: string, patrones: Array<string | RegExp>): boolean {
  return patrones.some((patron) => (typeof patron === 'string' ? texto.includes(patron) : patron.test(texto)));
}

function describirArgumentos(args: unknown[]): string {
  return args
    .map((arg) => {
      if (arg instanceof Error) return `${arg.name}: ${arg.message}`;
      if (typeof arg === 'string') return arg;
      try {
        return JSON.stringify(arg);
      } catch {
        return String(arg);
      }
    })
    .join(' ');
}

function describirMotivo(motivo: unknown): string {
  return motivo instanceof Error ? `${motivo.name}: ${motivo.message}` : String(motivo);
}

/**
 * Endurece la suite:
 * - Falla si un test escribe `console.warn`/`console.error` (los logs `warn`/`error`
 *   del API salen por ahi, asi que un aviso inesperado rompe la prueba).
 * - Captura `unhandledRejection`, `uncaughtException` y `process.warning`.
 */
export function instalarTestHardening(opciones: OpcionesEndurecimiento = {}) {
  const permitirConsola = Boolean(opciones.permitirConsola) || process.env.PERMITIR_CONSOLA_TEST === '1';
  const permitirAvisosNode = Boolean(opciones.permitirAvisosNode) || process.env.PERMITIR_AVISOS_NODE === '1';
  const patronesPermitidos = opciones.patronesConsolaPermitidos ?? [];

  const salidaConsola: string[] = [];
  const avisosNode: string[] = [];
  const sinManejar: string[] = [];

  const alRechazoSinManejar = (motivo: unknown) => {
    sinManejar.push(`unhandledRejection: ${describirMotivo(motivo)}`);
  };
  const alExcepcionSinManejar = (error: unknown) => {
    sinManejar.push(`uncaughtException: ${describirMotivo(error)}`);
  };
  const alAvisoNode = (aviso: Error) => {
    avisosNode.push(`${aviso.name}: ${aviso.message}`);
  };

  const restauraciones: Array<() => void> = [];

  beforeAll(() => {
    if (!permitirConsola) {
      for (const metodo of ['warn', 'error'] as const) {
        const original = console[metodo].bind(console);
        const espia = vi.spyOn(console, metodo).mockImplementation((...args: unknown[]) => {
          const mensaje = describirArgumentos(args);
          if (!coincideAlguno(mensaje, patronesPermitidos)) salidaConsola.push(`console.${metodo}: ${mensaje}`);
          original(...args);
        });
        restauraciones.push(() => espia.mockRestore());
      }
    }

    process.on('unhandledRejection', alRechazoSinManejar);
    process.on('uncaughtException', alExcepcionSinManejar);
    process.on('warning', alAvisoNode);
  });

  afterEach(() => {
    const problemas: string[] = [];
    if (salidaConsola.length > 0) problemas.push(salidaConsola.slice(0, 3).join(' | '));
    if (!permitirAvisosNode && avisosNode.length > 0) problemas.push(`process.warning: ${avisosNode.slice(0, 3).join(' | ')}`);
    if (sinManejar.length > 0) problemas.push(sinManejar.slice(0, 3).join(' | '));

    salidaConsola.length = 0;
    avisosNode.length = 0;
    sinManejar.length = 0;

    if (problemas.length > 0) {
      throw new Error(`Fallo por warnings/errores en entorno de test: ${problemas.join(' ; ')}`);
    }
  });

  afterAll(() => {
    process.off('unhandledRejection', alRechazoSinManejar);
    process.off('uncaughtException', alExcepcionSinManejar);
    process.off('warning', alAvisoNode);
    restauraciones.forEach((restaurar) => restaurar());
  });
}
