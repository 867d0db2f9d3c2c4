import * as grpc from '@grpc/grpc-js';
import * as protoLoader from '@grpc/proto-loader';
import path from 'path';
import fs from 'fs';
import { dirname } from 'path';
import { fileURLToPath } from 'url';
import type { LifecycleContext } from '../context.js';
import { createLifecycleServiceHandlers } from './services/lifecycle.service.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const PROTO_PATH = path.resolve(__dirname, '../../proto/lifecycle.proto');

const packageDefinition = protoLoader.loadSync(PROTO_PATH, {
    keepCase: true,
    longs: String,
    enums: String,
    defaults: true,
    oneofs: true,
});

const loadedServiceDefinition = packageDefinition['lifecycle.LifecycleService'];
if (!loadedServiceDefinition || 'format' in loadedServiceDefinition) {
    throw new Error(`lifecycle.LifecycleService is not a service in ${PROTO_PATH}`);
}
const lifecycleServiceDefinition: protoLoader.ServiceDefinition = loadedServiceDefinition;

/**
 * Verifies the shared secret internal callers send as Authorization metadata.
 * @grpc/grpc-js has no server-side interceptors for unary calls, so handlers are wrapped instead.
 */
export function authInterceptor<Req, Res>(
    call: grpc.ServerUnaryCall<Req, Res>,
    callback: grpc.sendUnaryData<Res>,
    next: grpc.handleUnaryCall<Req, Res>
): void {
    const authSecret = process.env.GRPC_INTERNAL_SECRET || 'dev-secret';
    const token = call.metadata.get('authorization')[0];

    if (token !== `Bearer ${authSecret}`) {
        return callback({
            code: grpc.status.UNAUTHENTICATED,
            details: 'Invalid or missing authentication token',
        });
    }

    next(call, callback);
}

// Wrapper for service handlers to include authentication
export function withAuth<Req, Res>(handler: grpc.handleUnaryCall<Req, Res>): grpc.handleUnaryCall<Req, Res> {
    return (call, callback) => {
        authInterceptor(call, callback, handler);
    };
}

/**
 * Creates the gRPC server with the lifecycle read API bound to the given context.
 */
export function createGrpcServer(context: LifecycleContext): grpc.Server {
    const server = new grpc.Server();
    const handlers = createLifecycleServiceHandlers(context);

    server.addService(lifecycleServiceDefinition, {
        GetTier: withAuth(handlers.GetTier),
        GetAssetWindow: withAuth(handlers.GetAssetWindow),
    });

    return server;
}

/**
 * TLS when GRPC_TLS_CERT and GRPC_TLS_KEY name PEM files; client certificates
 * are verified only when GRPC_TLS_CA is also set.
 */
function loadServerCredentials(): grpc.ServerCredentials {
    const certPath = process.env.GRPC_TLS_CERT;
    const keyPath = process.env.GRPC_TLS_KEY;
    if (!certPath || !keyPath) {
        console.warn('gRPC Server configured with Insecure credentials. Use TLS in production.');
        return grpc.ServerCredentials.createInsecure();
    }

    const cert = fs.readFileSync(certPath);
    const key = fs.readFileSync(keyPath);
    const caPath = process.env.GRPC_TLS_CA;
    const ca = caPath ? fs.readFileSync(caPath) : null;

    const credentials = grpc.ServerCredentials.createSsl(ca, [{ cert_chain: cert, private_key: key }], ca !== null);
    console.log('gRPC Server configured with TLS.');
    return credentials;
}

/**
 * Starts the gRPC server.
 * Reads TLS configuration from environment variables if provided.
 */
export function startGrpcServer(context: LifecycleContext, port: string | number = 50051): Promise<grpc.Server> {
    return new Promise((resolve, reject) => {
        const server = createGrpcServer(context);

        let credentials: grpc.ServerCredentials;
        try {
            credentials = loadServerCredentials();
        } catch (error) {
            console.error('Failed to load TLS certificates for gRPC server:', error);
            reject(error);
            return;
        }

        server.bindAsync(`0.0.0.0:${port}`, credentials, (error, boundPort) => {
            if (error) {
                console.error('Failed to bind gRPC server:', error);
                reject(error);
                return;
            }
            // grpc-js 1.10+ starts serving once bound
            console.log(`Lifecycle gRPC Service listening on port ${boundPort}`);
            resolve(server);
        });
    });
}
