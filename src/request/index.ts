export { FORM_CONTENT_TYPE, type FormBody, type RouteRequest, type RouteRequestInit, requestFromUrl } from './request.js';
export { splitPath } from './split-path.js';
