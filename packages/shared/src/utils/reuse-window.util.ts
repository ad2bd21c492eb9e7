/**
 * @ipam-report/shared - Reuse Window Utilities
 *
 * Janela de reuso: tempo mínimo após a desalocação antes que um endereço
 * possa ser emitido novamente
 */

/**
 * Janela padrão de reuso, em segundos (2 horas)
 */
export const DEFAULT_REUSE_AFTER_SECONDS = 7200;

/**
 * Valida a janela de reuso
 *
 * @param seconds - Janela em segundos
 * @returns True se for um inteiro não negativo
 */
export function validateReuseAfter(seconds: number): boolean {
  return Number.isInteger(seconds) && seconds >= 0;
}

/**
 * Calcula o instante de corte da janela de reuso.
 * Endereços desalocados depois desse instante ainda contam como usados.
 *
 * @param reuseAfterSeconds - Janela em segundos
 * @param now - Instante de referência
 */
export function calculateReuseCutoff(reuseAfterSeconds: number, now: Date = new Date()): Date {
  if (!validateReuseAfter(reuseAfterSeconds)) {
    throw new Error(`Invalid reuse window: ${reuseAfterSeconds}`);
  }

  return new Date(now.getTime() - reuseAfterSeconds * 1000);
}
