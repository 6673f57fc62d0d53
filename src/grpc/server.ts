import { join } from 'path';
import * as grpc from '@grpc/grpc-js';
import * as protoLoader from '@grpc/proto-loader';
import type { CallOptions, CredentialService } from '../types/auth';
import { isAuthError } from '../utils/errors';
import { createChildLogger } from '../utils/logger';
import { AuthGrpcController, toServiceError } from './auth.controller';

const log = createChildLogger('grpc');

export const PROTO_PATH = join(__dirname, '../../proto/auth/v1/auth.proto');
const SERVICE_NAME = 'auth.v1.AuthService';

export function loadAuthServiceDefinition(protoPath: string = PROTO_PATH): grpc.ServiceDefinition {
    const packageDefinition = protoLoader.loadSync(protoPath, {
        keepCase: true,
        longs: Number,
        enums: String,
        defaults: true,
        oneofs: true,
    });

    const definition = packageDefinition[SERVICE_NAME];
    // Message and enum definitions carry a `format`; services do not.
    if (!definition || 'format' in definition) {
        throw new Error(`${SERVICE_NAME} not found in ${protoPath}`);
    }
    return definition;
}

/** Absolute deadline in epoch ms, or undefined when the client set none. */
export function deadlineOf(call: grpc.ServerUnaryCall<unknown, unknown>): number | undefined {
    const deadline = call.getDeadline();
    const ms = deadline instanceof Date ? deadline.getTime() : deadline;
    return Number.isFinite(ms) ? ms : undefined;
}

type UnaryHandler = (request: unknown, options: CallOptions) => Promise<object>;

function unary(method: string, handler: UnaryHandler): grpc.handleUnaryCall<unknown, object> {
    return (call, callback) => {
        handler(call.request, { deadline: deadlineOf(call) }).then(
            (response) => callback(null, response),
            (err: unknown) => {
                if (!isAuthError(err) || !err.expose) {
                    log.error({ err, method }, 'gRPC call failed');
                }
                callback(toServiceError(err));
            }
        );
    };
}

export function createGrpcServer(service: CredentialService): grpc.Server {
    const controller = new AuthGrpcController(service);
    const server = new grpc.Server();

    server.addService(loadAuthServiceDefinition(), {
        Register: unary('Register', (req, opts) => controller.register(req, opts)),
        Login: unary('Login', (req, opts) => controller.login(req, opts)),
        ValidateToken: unary('ValidateToken', (req, opts) => controller.validateToken(req, opts)),
        RefreshToken: unary('RefreshToken', (req, opts) => controller.refreshToken(req, opts)),
        GetUserProfile: unary('GetUserProfile', (req, opts) => controller.getUserProfile(req, opts)),
    });

    return server;
}

export function startGrpcServer(server: grpc.Server, host: string, port: number): Promise<number> {
    return new Promise((resolve, reject) => {
        server.bindAsync(`${host}:${port}`, grpc.ServerCredentials.createInsecure(), (err, boundPort) => {
            if (err) {
                reject(err);
                return;
            }
            resolve(boundPort);
        });
    });
}

export function stopGrpcServer(server: grpc.Server): Promise<void> {
    return new Promise((resolve, reject) => {
        server.tryShutdown((err) => {
            if (err) {
                reject(err);
                return;
            }
            resolve();
        });
    });
}
