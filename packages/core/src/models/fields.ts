import { z } from 'zod';

// Fields fall back to a default instead of failing, so extraction is total.
export const text = z.string().catch('');
export const count = z.number().catch(0);
export const flag = z.boolean().catch(false);
