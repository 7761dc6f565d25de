/**
 * Llamadas a colaboradores externos (almacenes, resolvedor de pods).
 *
 * Un fallo del colaborador se reporta como 503 y nunca como respuesta
 * incorrecta: el envio no debe contarse como intento fallido del equipo.
 */
import { logError } from '../../infraestructura/logging/logger';
import { ErrorAplicacion } from './errorAplicacion';

export async function invocarColaborador<T>(colaborador: string, operacion: () => Promise<T>): Promise<T> {
  try {
    return await operacion();
  } catch (error) {
    if (error instanceof ErrorAplicacion) throw error;
    logError('Colaborador no disponible', error, { colaborador });
    throw new ErrorAplicacion('COLABORADOR_NO_DISPONIBLE', 'Servicio temporalmente no disponible', 503, { colaborador });
  }
}
