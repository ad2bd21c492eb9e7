/**
 * @ipam-report/shared - CIDR Utilities
 *
 * Aritmética de blocos IPv4 usada no cálculo de capacidade das subnets
 */

/**
 * Bloco IPv4 normalizado
 */
export interface Ipv4Block {
  /** Endereço de rede (inteiro sem sinal de 32 bits) */
  network: number;
  prefix: number;
  /** Último endereço do bloco (broadcast) */
  last: number;
  size: number;
}

const IPV4_OCTET_REGEX = /^(25[0-5]|2[0-4]\d|1\d{2}|[1-9]?\d)$/;

/**
 * Converte um endereço IPv4 em notação decimal para inteiro sem sinal
 */
export function parseIpv4(value: string): number {
  const parts = value.trim().split('.');
  if (parts.length !== 4 || parts.some((part) => !IPV4_OCTET_REGEX.test(part))) {
    throw new Error(`Invalid IPv4 address: ${value}`);
  }

  return parts.reduce((acc, part) => acc * 256 + Number(part), 0);
}

/**
 * Interpreta um bloco CIDR IPv4. Um endereço sem prefixo é tratado como /32.
 *
 * Bits de host são descartados: `10.0.0.7/24` vira `10.0.0.0/24`.
 */
export function parseCidr(cidr: string): Ipv4Block {
  const [ip, prefixRaw, ...rest] = cidr.trim().split('/');
  if (!ip || rest.length > 0) {
    throw new Error(`Invalid CIDR: ${cidr}`);
  }
  if (ip.includes(':')) {
    throw new Error(`IPv6 CIDR not supported: ${cidr}`);
  }

  const prefix = prefixRaw === undefined ? 32 : Number(prefixRaw);
  if (!Number.isInteger(prefix) || prefix < 0 || prefix > 32 || prefixRaw === '') {
    throw new Error(`Invalid CIDR prefix: ${cidr}`);
  }

  const size = 2 ** (32 - prefix);
  const address = parseIpv4(ip);
  const network = address - (address % size);

  return {
    network,
    prefix,
    last: network + size - 1,
    size,
  };
}

/**
 * Quantidade de endereços de um bloco: 2^(32 - prefixo)
 */
export function networkSize(cidr: string): number {
  return parseCidr(cidr).size;
}

/**
 * Tamanho da união de uma lista de blocos CIDR.
 * Blocos repetidos ou sobrepostos são contados uma única vez.
 */
export function cidrSetSize(cidrs: readonly string[]): number {
  const blocks = cidrs
    .map(parseCidr)
    .sort((a, b) => a.network - b.network || b.last - a.last);

  let total = 0;
  let currentFirst = -1;
  let currentLast = -1;

  for (const block of blocks) {
    if (block.network > currentLast) {
      if (currentLast >= 0) {
        total += currentLast - currentFirst + 1;
      }
      currentFirst = block.network;
      currentLast = block.last;
    } else if (block.last > currentLast) {
      currentLast = block.last;
    }
  }

  if (currentLast >= 0) {
    total += currentLast - currentFirst + 1;
  }

  return total;
}
