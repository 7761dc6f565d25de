/**
 * Elimina operadores Mongo (`$...`) y claves con punto de body/query/params.
 *
 * Los filtros de los almacenes se construyen con valores ya validados por Zod,
 * pero la sanitizacion cubre cualquier ruta que lea `req` directamente.
 */
import type { NextFunction, Request, Response } from 'express';

function esObjetoPlano(valor: unknown): valor is Record<string, unknown> {
  return typeof valor === 'object' && valor !== null && !Array.isArray(valor);
}

function limpiar(valor: unknown): void {
  if (Array.isArray(valor)) {
    valor.forEach(limpiar);
    return;
  }
  if (!esObjetoPlano(valor)) return;

  for (const clave of Object.keys(valor)) {
    if (clave.startsWith('$') || clave.includes('.')) {
      delete valor[clave];
      continue;
    }
    limpiar(valor[clave]);
  }
}

export function sanitizarMongo() {
  return (req: Request, _res: Response, next: NextFunction) => {
    limpiar(req.body);
    limpiar(req.params);

    // Express 5 recalcula `req.query` en cada acceso: se fija una copia limpia.
    const consulta: unknown = req.query;
    if (esObjetoPlano(consulta)) {
      const copia = { ...consulta };
      limpiar(copia);
      Object.defineProperty(req, 'query', { value: copia, writable: true, configurable: true, enumerable: true });
    }

    next();
  };
}
