export type {
  HttpResponseRecord,
  HttpVersion,
  RequestParts,
} from './http-response-record.js';
