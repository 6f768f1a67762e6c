import type { Port } from '../design_types';

export function formatPort(port: Port): string {
    const range = port.width > 1 ? `[${port.width - 1}:0] ` : '';
    return `${port.direction} ${range}${port.name}`;
}

export function formatPortList(ports: readonly Port[]): string {
    return ports.length > 0 ? ports.map(formatPort).join(', ') : '(no ports)';
}
