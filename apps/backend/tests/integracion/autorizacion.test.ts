import request from 'supertest';
import { beforeAll, describe, expect, it } from 'vitest';
import { crearApp } from '../../src/app';
import { crearDependenciasMemoria } from '../utils/memoria';
import { cabeceraAuth, tokenParticipantePrueba } from '../utils/token';

describe('autorizacion', () => {
  const deps = crearDependenciasMemoria();
  const app = crearApp(deps);
  const participante = cabeceraAuth(tokenParticipantePrueba());

  beforeAll(async () => {
    await deps.almacenRetos.crearReto({ nombre: 'Base', categoria: 'web', descripcion: 'pod :pod_id:' });
  });

  it('rechaza rutas protegidas sin token', async () => {
    const respuesta = await request(app).get('/api/retos/reto-1/descripcion').expect(401);
    expect(respuesta.body.error.codigo).toBe('NO_AUTORIZADO');
  });

  it('rechaza token invalido', async () => {
    const respuesta = await request(app)
      .post('/api/retos/reto-1/envios')
      .set({ Authorization: 'Bearer token-invalido' })
      .send({ respuesta: 'flag{x}' })
      .expect(401);
    expect(respuesta.body.error.codigo).toBe('TOKEN_INVALIDO');
  });

  it('las rutas de autoria requieren rol admin', async () => {
    const peticiones = [
      request(app).post('/api/retos').set(participante).send({ nombre: 'Reto', categoria: 'web' }),
      request(app).get('/api/retos/reto-1/banderas').set(participante),
      request(app).post('/api/retos/reto-1/banderas').set(participante).send({ tipo: 'predeterminada', contenido: 'flag{x}' }),
      request(app).post('/api/retos/reto-1/banderas/lote').set(participante).send({ banderas: [{ podId: 1, contenido: 'a' }] }),
      request(app).post('/api/retos/reto-1/banderas/bandera-1/eliminar').set(participante),
      request(app).get('/api/retos/reto-1/vista-previa').set(participante)
    ];

    for (const peticion of peticiones) {
      const respuesta = await peticion.expect(403);
      expect(respuesta.body.error.codigo).toBe('SIN_PERMISO');
    }
  });

  it('un participante no puede elegir el pod de la descripcion', async () => {
    const respuesta = await request(app).get('/api/retos/reto-1/descripcion?pod=3').set(participante).expect(403);
    expect(respuesta.body.error.codigo).toBe('SIN_PERMISO');
  });
});
