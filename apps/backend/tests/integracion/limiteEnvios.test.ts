import request from 'supertest';
import { describe, expect, it, vi } from 'vitest';
import { fijarEntorno } from '../utils/entorno';
import { crearDependenciasMemoria } from '../utils/memoria';
import { cabeceraAuth, tokenParticipantePrueba } from '../utils/token';

describe('limite de envios por usuario', () => {
  it('responde 429 al exceder los envios por minuto sin afectar a otros usuarios', async () => {
    const restaurar = fijarEntorno({ ENVIOS_LIMITE_POR_MINUTO: '2' });

    try {
      vi.resetModules();
      const { crearApp } = await import('../../src/app');
      const deps = crearDependenciasMemoria();
      const app = crearApp(deps);
      const retoId = (await deps.almacenRetos.crearReto({ nombre: 'Base', categoria: 'web', descripcion: '' })).id;
      deps.almacenBanderas.sembrar({ tipo: 'predeterminada', retoId, contenido: 'flag{base}', sensibilidad: 'exacta' });

      const usuario1 = cabeceraAuth(tokenParticipantePrueba('usuario-1', 'equipo-1'));
      const usuario2 = cabeceraAuth(tokenParticipantePrueba('usuario-2', 'equipo-1'));

      await request(app).post(`/api/retos/${retoId}/envios`).set(usuario1).send({ respuesta: 'flag{a}' }).expect(200);
      await request(app).post(`/api/retos/${retoId}/envios`).set(usuario1).send({ respuesta: 'flag{b}' }).expect(200);
      const bloqueado = await request(app)
        .post(`/api/retos/${retoId}/envios`)
        .set(usuario1)
        .send({ respuesta: 'flag{base}' })
        .expect(429);
      const otro = await request(app).post(`/api/retos/${retoId}/envios`).set(usuario2).send({ respuesta: 'flag{base}' }).expect(200);

      expect(bloqueado.body.error.codigo).toBe('DEMASIADOS_ENVIOS');
      expect(otro.body.correcta).toBe(true);
    } finally {
      restaurar();
      vi.resetModules();
    }
  });
});
