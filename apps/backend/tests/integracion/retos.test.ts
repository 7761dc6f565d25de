// Alta de retos por pod y descripcion por pod.
import type { Express } from 'express';
import request from 'supertest';
import { beforeEach, describe, expect, it } from 'vitest';
import { crearApp } from '../../src/app';
import { crearDependenciasMemoria, type DependenciasMemoria } from '../utils/memoria';
import { cabeceraAuth, tokenAdminPrueba, tokenParticipantePrueba } from '../utils/token';

const retoNuevo = {
  nombre: 'Servidor expuesto',
  categoria: 'web',
  descripcion: 'Ataca http://10.10.:pod_id:.2 desde el pod :pod_id:',
  banderaPredeterminada: 'flag{base}',
  banderasPod: [
    { podId: 7, contenido: 'flag{seven}' },
    { podId: null, contenido: '' }
  ]
};

describe('retos por pod', () => {
  let deps: DependenciasMemoria;
  let app: Express;
  const admin = cabeceraAuth(tokenAdminPrueba());
  const equipo7 = cabeceraAuth(tokenParticipantePrueba('usuario-7', 'equipo-7'));
  const sinPod = cabeceraAuth(tokenParticipantePrueba('usuario-x', null));

  beforeEach(() => {
    deps = crearDependenciasMemoria();
    deps.resolvedorPod.asignaciones.set('equipo-7', 7);
    app = crearApp(deps);
  });

  it('crea el reto con sus banderas y valida envios por pod', async () => {
    const creado = await request(app).post('/api/retos').set(admin).send(retoNuevo).expect(201);

    expect(creado.body.reto).toEqual({
      id: 'reto-1',
      nombre: 'Servidor expuesto',
      categoria: 'web',
      descripcion: 'Ataca http://10.10.:pod_id:.2 desde el pod :pod_id:',
      tipo: 'por_pod'
    });
    expect(creado.body.banderas).toEqual([
      { id: 'bandera-1', retoId: 'reto-1', tipo: 'predeterminada', contenido: 'flag{base}', sensibilidad: 'exacta' },
      { id: 'bandera-2', retoId: 'reto-1', tipo: 'por_pod', podId: 7, contenido: 'flag{seven}', sensibilidad: 'exacta' }
    ]);

    const envio = await request(app).post('/api/retos/reto-1/envios').set(equipo7).send({ respuesta: 'flag{seven}' }).expect(200);
    expect(envio.body.correcta).toBe(true);
  });

  it('no crea el reto si las filas de pods son invalidas', async () => {
    const respuesta = await request(app)
      .post('/api/retos')
      .set(admin)
      .send({ ...retoNuevo, banderasPod: [{ podId: 3, contenido: 'flag{a}' }, { podId: 3, contenido: 'flag{b}' }] })
      .expect(400);

    expect(respuesta.body.error.codigo).toBe('FILAS_POD_INVALIDAS');
    expect(deps.almacenRetos.retos.size).toBe(0);
  });

  it('sustituye el marcador con el pod del equipo', async () => {
    await request(app).post('/api/retos').set(admin).send(retoNuevo).expect(201);

    const respuesta = await request(app).get('/api/retos/reto-1/descripcion').set(equipo7).expect(200);

    expect(respuesta.body).toEqual({
      retoId: 'reto-1',
      nombre: 'Servidor expuesto',
      categoria: 'web',
      descripcion: 'Ataca http://10.10.7.2 desde el pod 7',
      podId: 7
    });
  });

  it('sin pod la descripcion queda intacta', async () => {
    await request(app).post('/api/retos').set(admin).send(retoNuevo).expect(201);

    const respuesta = await request(app).get('/api/retos/reto-1/descripcion').set(sinPod).expect(200);

    expect(respuesta.body.descripcion).toBe('Ataca http://10.10.:pod_id:.2 desde el pod :pod_id:');
    expect(respuesta.body.podId).toBeNull();
  });

  it('el admin previsualiza la descripcion de otro pod', async () => {
    await request(app).post('/api/retos').set(admin).send(retoNuevo).expect(201);

    const respuesta = await request(app).get('/api/retos/reto-1/descripcion?pod=3').set(admin).expect(200);

    expect(respuesta.body.descripcion).toBe('Ataca http://10.10.3.2 desde el pod 3');
    expect(respuesta.body.podId).toBe(3);
  });

  it('vista previa por pods, 1 y 2 por defecto', async () => {
    await request(app).post('/api/retos').set(admin).send(retoNuevo).expect(201);

    const porDefecto = await request(app).get('/api/retos/reto-1/vista-previa').set(admin).expect(200);
    const elegidos = await request(app).get('/api/retos/reto-1/vista-previa?pods=5,5,9').set(admin).expect(200);

    expect(porDefecto.body.vistas).toEqual([
      { podId: 1, descripcion: 'Ataca http://10.10.1.2 desde el pod 1' },
      { podId: 2, descripcion: 'Ataca http://10.10.2.2 desde el pod 2' }
    ]);
    expect(elegidos.body.vistas.map((vista: { podId: number }) => vista.podId)).toEqual([5, 9]);
  });

  it('responde 404 para retos inexistentes', async () => {
    const respuesta = await request(app).get('/api/retos/reto-999/descripcion').set(equipo7).expect(404);

    expect(respuesta.body.error.codigo).toBe('RETO_NO_ENCONTRADO');
  });
});
