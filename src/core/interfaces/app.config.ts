import type { z } from 'zod';
import type { ConfigSchema } from '../config.service.js';

export type AppConfig = z.infer<typeof ConfigSchema>;
