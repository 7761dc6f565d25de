/**
 * Tipos compartidos del dominio.
 */
export type TipoBandera = 'predeterminada' | 'por_pod';
export type SensibilidadBandera = 'exacta' | 'sin_mayusculas';
export type Veredicto = 'correcta' | 'incorrecta' | 'estado_invalido';
export type OrigenCandidatas = 'por_pod' | 'predeterminada';
export type RolSesion = 'admin' | 'participante';
export type TipoTitularPod = 'equipo' | 'usuario';
export type TipoReto = 'por_pod';

type BanderaBase = {
  id: string;
  retoId: string;
  contenido: string;
  sensibilidad: SensibilidadBandera;
};

export type BanderaPredeterminada = BanderaBase & { tipo: 'predeterminada' };
export type BanderaPod = BanderaBase & { tipo: 'por_pod'; podId: number };
export type Bandera = BanderaPredeterminada | BanderaPod;

/** Quien envia: la sesion autenticada de la plataforma. */
export type Principal = {
  usuarioId: string;
  equipoId: string | null;
  rol: RolSesion;
};

export type ResultadoValidacion = {
  veredicto: Veredicto;
  origen: OrigenCandidatas | null;
  candidatas: number;
  podActivo: number | null;
};
