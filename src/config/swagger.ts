import path from 'path';
import swaggerJsdoc from 'swagger-jsdoc';
import { config } from './env';

const options: swaggerJsdoc.Options = {
    definition: {
        openapi: '3.0.0',
        info: {
            title: 'UMKM & Attendance API',
            version: '1.0.0',
            description: 'Attendance check-ins and small business (UMKM) registrations',
            license: {
                name: 'MIT',
                url: 'https://opensource.org/licenses/MIT'
            }
        },
        servers: [
            {
                url: `http://localhost:${config.port}`,
                description: 'Development server'
            }
        ],
        components: {
            schemas: {
                Error: {
                    type: 'object',
                    properties: {
                        detail: {
                            type: 'string',
                            description: 'Error message'
                        }
                    }
                }
            }
        }
    },
    // Route files carry the @swagger blocks; match both sources and compiled output.
    apis: [path.join(__dirname, '../routes/*.{ts,js}')],
};

export const swaggerSpec = swaggerJsdoc(options);
