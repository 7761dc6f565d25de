/**
 * Endpoint de salud para monitoreo de API y base de datos.
 */
import { Router } from 'express';
import mongoose from 'mongoose';

const descripcionesEstadoDb = ['desconectado', 'conectado', 'conectando', 'desconectando'];

export function crearRutasSalud() {
  const router = Router();

  router.get('/', (_req, res) => {
    const estado = Number(mongoose.connection.readyState);
    const descripcion = descripcionesEstadoDb[estado] ?? 'desconocido';
    res.json({ estado: 'ok', tiempoActivo: process.uptime(), db: { estado, descripcion } });
  });

  return router;
}
