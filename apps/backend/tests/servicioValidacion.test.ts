// Pruebas del servicio de validacion de envios con colaboradores en memoria.
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { Principal } from '../src/compartido/tipos/dominio';
import { crearServicioValidacion } from '../src/modulos/modulo_banderas/servicioValidacion';
import { crearDependenciasMemoria, type DependenciasMemoria } from './utils/memoria';

const equipo7: Principal = { usuarioId: 'usuario-7', equipoId: 'equipo-7', rol: 'participante' };
const equipo3: Principal = { usuarioId: 'usuario-3', equipoId: 'equipo-3', rol: 'participante' };
const sinPod: Principal = { usuarioId: 'usuario-x', equipoId: 'equipo-x', rol: 'participante' };
const admin: Principal = { usuarioId: 'admin-1', equipoId: null, rol: 'admin' };

async function capturarRechazo(promesa: Promise<unknown>): Promise<unknown> {
  try {
    await promesa;
  } catch (error) {
    return error;
  }
  throw new Error('Se esperaba un rechazo');
}

describe('servicioValidacion', () => {
  let deps: DependenciasMemoria;
  let retoId: string;

  beforeEach(async () => {
    deps = crearDependenciasMemoria();
    const reto = await deps.almacenRetos.crearReto({ nombre: 'Base', categoria: 'web', descripcion: '' });
    retoId = reto.id;
    deps.almacenBanderas.sembrar({ tipo: 'predeterminada', retoId, contenido: 'flag{base}', sensibilidad: 'exacta' });
    deps.almacenBanderas.sembrar({ tipo: 'por_pod', retoId, contenido: 'flag{seven}', sensibilidad: 'exacta', podId: 7 });
    deps.resolvedorPod.asignaciones.set('equipo-7', 7);
    deps.resolvedorPod.asignaciones.set('equipo-3', 3);
    deps.resolvedorPod.asignaciones.set('admin-1', 3);
  });

  it('aplica la bandera del pod resuelto para el equipo', async () => {
    const servicio = crearServicioValidacion(deps);

    const correcta = await servicio.validar(retoId, 'flag{seven}', { principal: equipo7, podVistaPrevia: null });
    const predeterminada = await servicio.validar(retoId, 'flag{base}', { principal: equipo7, podVistaPrevia: null });

    expect(correcta).toEqual({ veredicto: 'correcta', origen: 'por_pod', candidatas: 1, podActivo: 7 });
    expect(predeterminada.veredicto).toBe('incorrecta');
  });

  it('otros pods y equipos sin pod usan la predeterminada', async () => {
    const servicio = crearServicioValidacion(deps);

    const pod3 = await servicio.validar(retoId, 'flag{base}', { principal: equipo3, podVistaPrevia: null });
    const sinAsignar = await servicio.validar(retoId, 'flag{base}', { principal: sinPod, podVistaPrevia: null });

    expect(pod3).toEqual({ veredicto: 'correcta', origen: 'predeterminada', candidatas: 1, podActivo: 3 });
    expect(sinAsignar).toEqual({ veredicto: 'correcta', origen: 'predeterminada', candidatas: 1, podActivo: null });
  });

  it('la vista previa de admin reproduce el veredicto del pod elegido', async () => {
    const servicio = crearServicioValidacion(deps);

    for (const texto of ['flag{seven}', 'flag{base}', 'flag{otra}']) {
      const equipo = await servicio.validar(retoId, texto, { principal: equipo7, podVistaPrevia: null });
      const vistaPrevia = await servicio.validar(retoId, texto, { principal: admin, podVistaPrevia: 7 });
      expect(vistaPrevia).toEqual(equipo);
    }
  });

  it('rechaza el override de pod de un participante', async () => {
    const servicio = crearServicioValidacion(deps);

    const error = await capturarRechazo(
      servicio.validar(retoId, 'flag{seven}', { principal: equipo3, podVistaPrevia: 7 })
    );

    expect(error).toMatchObject({ codigo: 'SIN_PERMISO', estadoHttp: 403 });
  });

  it('responde 404 para retos inexistentes', async () => {
    const servicio = crearServicioValidacion(deps);

    const error = await capturarRechazo(servicio.validar('reto-999', 'flag{base}', { principal: equipo7, podVistaPrevia: null }));

    expect(error).toMatchObject({ codigo: 'RETO_NO_ENCONTRADO', estadoHttp: 404 });
  });

  it('sin candidatas devuelve estado invalido', async () => {
    const reto = await deps.almacenRetos.crearReto({ nombre: 'Solo pods', categoria: 'web', descripcion: '' });
    deps.almacenBanderas.sembrar({ tipo: 'por_pod', retoId: reto.id, contenido: 'flag{uno}', sensibilidad: 'exacta', podId: 1 });
    const servicio = crearServicioValidacion(deps);

    const resultado = await servicio.validar(reto.id, 'flag{uno}', { principal: sinPod, podVistaPrevia: null });

    expect(resultado).toEqual({ veredicto: 'estado_invalido', origen: null, candidatas: 0, podActivo: null });
  });

  describe('colaboradores caidos', () => {
    const nivelAnterior = process.env.LOG_NIVEL;

    beforeEach(() => {
      process.env.LOG_NIVEL = 'silencio';
    });

    afterEach(() => {
      process.env.LOG_NIVEL = nivelAnterior;
    });

    it('un fallo del almacen es 503 y no un veredicto', async () => {
      deps.almacenBanderas.fallar = true;
      const servicio = crearServicioValidacion(deps);

      const error = await capturarRechazo(servicio.validar(retoId, 'flag{base}', { principal: equipo7, podVistaPrevia: null }));

      expect(error).toMatchObject({
        codigo: 'COLABORADOR_NO_DISPONIBLE',
        estadoHttp: 503,
        detalles: { colaborador: 'almacenBanderas' }
      });
    });

    it('un fallo del resolvedor de pods es 503', async () => {
      deps.resolvedorPod.fallar = true;
      const servicio = crearServicioValidacion(deps);

      const error = await capturarRechazo(servicio.validar(retoId, 'flag{base}', { principal: equipo7, podVistaPrevia: null }));

      expect(error).toMatchObject({ codigo: 'COLABORADOR_NO_DISPONIBLE', detalles: { colaborador: 'resolvedorPod' } });
    });

    it('un pod invalido devuelto por el resolvedor es 503', async () => {
      const servicio = crearServicioValidacion({ ...deps, resolvedorPod: { resolverPod: async () => -2 } });

      const error = await capturarRechazo(servicio.validar(retoId, 'flag{base}', { principal: equipo7, podVistaPrevia: null }));

      expect(error).toMatchObject({ codigo: 'COLABORADOR_NO_DISPONIBLE', estadoHttp: 503 });
    });
  });

  it('registra el veredicto como evento de auditoria', async () => {
    const nivelAnterior = process.env.LOG_NIVEL;
    process.env.LOG_NIVEL = 'info';
    const espia = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    try {
      const reto = await deps.almacenRetos.crearReto({ nombre: 'Vacio', categoria: 'web', descripcion: '' });
      const servicio = crearServicioValidacion(deps);
      await servicio.validar(reto.id, 'flag{base}', { principal: equipo7, podVistaPrevia: null });

      const eventos: unknown[] = espia.mock.calls.map(([linea]) => JSON.parse(String(linea)));
      expect(eventos).toContainEqual(
        expect.objectContaining({
          msg: 'Envio evaluado',
          auditoria: true,
          retoId: reto.id,
          usuarioId: 'usuario-7',
          equipoId: 'equipo-7',
          vistaPrevia: false,
          veredicto: 'estado_invalido',
          candidatas: 0,
          podActivo: 7
        })
      );
    } finally {
      espia.mockRestore();
      process.env.LOG_NIVEL = nivelAnterior;
    }
  });
});
