/**
 * Conexion a MongoDB con Mongoose.
 */
import mongoose from 'mongoose';
import { configuracion } from '../../configuracion';
import { log, logError } from '../logging/logger';
import { ModeloBandera } from '../../modulos/modulo_banderas/modeloBandera';
import { ModeloAsignacionPod } from '../../modulos/modulo_pods/modeloAsignacionPod';

export async function conectarBaseDatos() {
  if (!configuracion.mongoUri) {
    log('warn', 'MONGODB_URI no esta definido; las banderas no estaran disponibles');
    return;
  }

  mongoose.set('strictQuery', true);

  try {
    await mongoose.connect(configuracion.mongoUri);
    // El indice unico (reto, pod) es el que impide dos banderas para el mismo pod.
    await Promise.all([ModeloBandera.createIndexes(), ModeloAsignacionPod.createIndexes()]);
    log('ok', 'Conexion a MongoDB exitosa', { db: mongoose.connection.name });
  } catch (error) {
    logError('Fallo la conexion a MongoDB', error);
    throw error;
  }
}

export async function desconectarBaseDatos() {
  if (mongoose.connection.readyState === 0) return;
  await mongoose.disconnect();
  log('info', 'Conexion a MongoDB cerrada');
}
