/**
 * Colaboradores del API. Por defecto se respaldan en MongoDB; las pruebas
 * inyectan implementaciones en memoria.
 */
import { crearAlmacenBanderasMongo, type AlmacenBanderas } from './modulos/modulo_banderas/almacenBanderas';
import { crearResolvedorPodMongo, type ResolvedorPod } from './modulos/modulo_pods/resolvedorPod';
import { crearAlmacenRetosMongo, type AlmacenRetos } from './modulos/modulo_retos/almacenRetos';

export type DependenciasApp = {
  almacenBanderas: AlmacenBanderas;
  almacenRetos: AlmacenRetos;
  resolvedorPod: ResolvedorPod;
};

export function crearDependenciasMongo(): DependenciasApp {
  return {
    almacenBanderas: crearAlmacenBanderasMongo(),
    almacenRetos: crearAlmacenRetosMongo(),
    resolvedorPod: crearResolvedorPodMongo()
  };
}
