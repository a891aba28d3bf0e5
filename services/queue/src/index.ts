/**
 * queue — request/reply binding (the ZeroMQ socket lives in ./zmq.js)
 */
export { handleQueueMessage, ReplyLoop, QUEUE_ENDPOINT, type QueueReply, type ReplySocket } from "./reply-loop.js";
