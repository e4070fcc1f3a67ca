import { INestApplication } from '@nestjs/common';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';

export function setupSwagger(app: INestApplication): void {
  const config = new DocumentBuilder()
    .setTitle('EDI Intake API')
    .setDescription('Applicant intake records, collectors and the administrative service-role path')
    .setVersion('1.0')
    .setLicense('MIT', 'https://opensource.org/licenses/MIT')
    .addTag('applicants', 'Intake records (open insert/read policy)')
    .addTag('admin', 'Service-role operations that bypass the access policy')
    .addTag('health', 'Health check endpoints')
    .addApiKey({ type: 'apiKey', name: 'x-service-role-key', in: 'header' }, 'service-role')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api/docs', app, document);
}
