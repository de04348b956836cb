import { DocumentBuilder, OpenAPIObject, SwaggerCustomOptions } from '@nestjs/swagger';

/**
 * OpenAPI configuration used by main.ts to serve Swagger UI at /api/docs.
 */
export function buildSwaggerConfig(): Omit<OpenAPIObject, 'paths'> {
  return new DocumentBuilder()
    .setTitle('Vendor Bid API')
    .setDescription(
      'Runs email conversations with event vendors: sends bid requests, reads vendor replies ' +
      'and follows up until every required question is answered.',
    )
    .setVersion('1.0.0')
    .addTag('Bids', 'Start a bid conversation with a vendor')
    .addTag('Inbound Email', 'Vendor replies delivered by the mail provider')
    .addTag('Conversations', 'Conversation state for monitoring and debugging')
    .addTag('Health', 'Liveness and readiness probes')
    .build();
}

export const swaggerCustomOptions: SwaggerCustomOptions = {
  swaggerOptions: {
    tagsSorter: 'alpha',
    operationsSorter: 'method',
    docExpansion: 'none',
    filter: true,
    showRequestDuration: true,
  },
  customSiteTitle: 'Vendor Bid API Documentation',
  customCss: '.swagger-ui .topbar { display: none }',
};
