// src/index.ts

export { App } from './app';
export type { AppOptions, Controller } from './app';
export { HttpServer } from './server';
export type { RequestListener } from './server';
export { RouteTable } from './route_table';
export { URLPattern, hasPlaceholders } from './url_pattern';
export type { ParamType, PatternParameter } from './url_pattern';
export { RequestContext, normalizeHeaderName } from './request';
export { ResponseContext, normalizeStatus } from './response';
export type { HeaderPair, ResponseBody, UrlResolver } from './response';
export { parseHttpRequest, expectedRequestLength, decodeBody } from './http_parser';
export { buildHttpResponse, buildErrorResponse, serializeResponse } from './http_writer';
export { handleRequest } from './http_handler';
export { loadConfig, defaultConfig } from './config';
export type { ServerConfig } from './config';
export { createLogger, silentLogger } from './logger';
export type { Logger } from './logger';
export {
    HTTP_METHODS,
    HTTPError,
    MalformedRequestError,
    NotFoundError,
    MiddlewareConfigurationError,
    extractErrorMessage,
} from './types';
export type { HTTPMethod, Handler, Middleware, ParamValue, RouteParams, RequestBody, FormFields, Route } from './types';
