import { OpenAPIHono } from '@hono/zod-openapi';
import type { AppEnv } from '../../context';
import health from './health';
import convert from './convert';

const v1 = new OpenAPIHono<AppEnv>();

v1.route('/health', health);
v1.route('/convert', convert);

export default v1;
