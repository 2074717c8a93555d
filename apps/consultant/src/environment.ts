import { registerAs } from '@nestjs/config';

export default registerAs('app', () => ({
  port: Number(process.env['PORT']) || 3001,
  // Use :: to bind to both IPv4 and IPv6
  host: process.env['HOST'] || '::',
}));
