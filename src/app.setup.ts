import { join } from 'path';
import helmet from '@fastify/helmet';
import type { NestFastifyApplication } from '@nestjs/platform-fastify';

export const PUBLIC_DIR = join(__dirname, '..', 'public');

/**
 * Fastify plugins shared by the server and the HTTP tests.
 */
export async function configureApp(app: NestFastifyApplication): Promise<void> {
  await app.register(helmet, {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        styleSrc: ["'self'"],
        scriptSrc: ["'self'"],
        imgSrc: ["'self'", 'data:'],
        formAction: ["'self'"],
        objectSrc: ["'none'"],
        frameSrc: ["'none'"],
      },
    },
    crossOriginEmbedderPolicy: false,
  });

  app.useStaticAssets({
    root: PUBLIC_DIR,
    prefix: '/static/',
  });
}
