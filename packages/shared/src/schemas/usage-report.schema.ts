/**
 * @ipam-report/shared - Usage Report Schema
 *
 * Schemas Zod para as linhas lidas do banco IPAM e para o relatório final
 */

import { z } from 'zod';

/**
 * Linha da agregação de IPs usados (uma por tenant)
 */
export const usedIpRowSchema = z.object({
  tenant_id: z.string().min(1, 'tenant_id não pode ser vazio'),
  used: z.coerce.number().int('used deve ser um inteiro').min(0, 'used deve ser >= 0'),
});

/**
 * Linha de capacidade de uma subnet, com os CIDRs excluídos pela política
 */
export const subnetCapacityRowSchema = z.object({
  subnet_id: z.string().min(1),
  tenant_id: z.string().min(1, 'tenant_id não pode ser vazio'),
  cidr: z.string().min(1, 'cidr não pode ser vazio'),
  excluded_cidrs: z.array(z.string()).default([]),
});

/**
 * Contagem de endereços por tenant
 */
export const tenantCountsSchema = z.record(z.string(), z.number().int());

/**
 * Relatório impresso na saída padrão
 */
export const usageReportSchema = z
  .object({
    used: tenantCountsSchema.describe('Endereços alocados ou retidos pela janela de reuso'),
    unused: tenantCountsSchema.describe('Capacidade restante por tenant'),
  })
  .strict();

export type UsedIpRow = z.infer<typeof usedIpRowSchema>;
export type SubnetCapacityRow = z.infer<typeof subnetCapacityRowSchema>;
export type TenantCounts = z.infer<typeof tenantCountsSchema>;
export type UsageReport = z.infer<typeof usageReportSchema>;
