import { Injectable, CanActivate, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Request } from 'express';

/**
 * Restricts the /metrics endpoint to whitelisted client addresses.
 * Entries may be exact addresses, `*`, or an IPv4 network such as `10.0.0.0/8`;
 * IPv4-mapped IPv6 clients (`::ffff:a.b.c.d`) match networks by their IPv4 form.
 */
@Injectable()
export class MetricsGuard implements CanActivate {
  private readonly allowedIps: string[];

  constructor(private configService: ConfigService) {
    this.allowedIps = this.configService.get<string[]>('metrics.allowedIps', ['127.0.0.1', '::1']);
  }

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<Request>();
    const clientIp = this.getClientIp(request);

    const isAllowed = this.allowedIps.some((allowedIp) => {
      if (allowedIp.includes('/')) {
        return this.inNetwork(clientIp, allowedIp);
      }
      return clientIp === allowedIp || allowedIp === '*';
    });

    if (!isAllowed) {
      throw new UnauthorizedException(
        `Access denied. IP ${clientIp} not whitelisted for metrics endpoint.`,
      );
    }

    return true;
  }

  private inNetwork(clientIp: string, cidr: string): boolean {
    const [network, prefixText = ''] = cidr.split('/');
    const address = parseIpv4(clientIp.replace(/^::ffff:/i, ''));
    const base = parseIpv4(network);

    if (address === null || base === null || !/^\d{1,2}$/.test(prefixText)) {
      return false;
    }

    const prefix = Number(prefixText);
    if (prefix > 32) {
      return false;
    }

    const mask = prefix === 0 ? 0 : (0xffffffff << (32 - prefix)) >>> 0;
    return (address & mask) >>> 0 === (base & mask) >>> 0;
  }

  private getClientIp(request: Request): string {
    const forwarded = request.headers['x-forwarded-for'];
    const firstForwarded = (Array.isArray(forwarded) ? forwarded[0] : forwarded)
      ?.split(',')[0]
      .trim();

    return firstForwarded || request.socket.remoteAddress || request.ip || '';
  }
}

function parseIpv4(address: string): number | null {
  const octets = address.split('.');
  if (octets.length !== 4 || !octets.every((octet) => /^\d{1,3}$/.test(octet))) {
    return null;
  }

  const values = octets.map(Number);
  if (values.some((value) => value > 255)) {
    return null;
  }

  return values.reduce((result, value) => result * 256 + value, 0);
}
