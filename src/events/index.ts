/**
 * elastic-list - Events Domain
 */

export { createElasticEmitter, type ElasticEmitter } from "./emitter";
