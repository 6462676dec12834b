//shardcore/index.ts

export * from "./core/errors";
export { AsyncChannel } from "./core/AsyncChannel";
export { CapacityLimiter, type Release } from "./core/CapacityLimiter";
export { KeyedMutex } from "./core/KeyedMutex";
export { TaskScope, withTaskScope, type ScopedTask } from "./core/TaskScope";
export { sleep } from "./core/time";

export * from "./config/config";
export { Logger } from "./utils/logger";

export * from "./gateway/GatewayEvents";
export { GATEWAY_VERSION, ALL_INTENTS, GatewayOp, GatewayCloseCode, classifyCloseCode } from "./gateway/GatewayOpcodes";
export { decodeFrame, encodeCommand, type GatewayEnvelope } from "./gateway/GatewayCodec";
export { connectWs, WsGatewaySocket, type GatewaySocket, type SocketConnector, type SocketFrame } from "./gateway/GatewaySocket";
export { GatewayConnection, type ConnectionState, type StateListener } from "./gateway/GatewayConnection";
export { GatewayCollection, shardForId, type EventStream } from "./gateway/GatewayCollection";
export type { SessionSnapshot } from "./gateway/SessionState";

export * from "./models/Snowflake";
export type { RawChannel, RawEmoji, RawGuild, RawMember, RawMessage, RawUser } from "./models/schemas";
export { Channel, ChannelType, channelGuildId, channelName, isTextual, toChannelSnapshot, type ChannelKind, type ChannelSnapshot } from "./models/Channel";
export { Guild, unavailableGuild, type CachedGuild, type UnavailableGuild } from "./models/Guild";
export { Member } from "./models/Member";
export { Message } from "./models/Message";
export { User } from "./models/User";
export { ModelFactory } from "./models/ModelFactory";
export type { ClientRef, MessageSender } from "./models/ClientRef";

export { ObjectCache, type CacheKind } from "./cache/ObjectCache";

export * from "./events/DomainEvents";
export { EventParser } from "./events/EventParser";
export { GuildStreamTracker } from "./events/GuildStreamTracker";
export { GuildChunker, type ShardSender } from "./events/GuildChunker";

export type { AnyEvent, DispatcherClient, EventContext, EventHandler, EventOf, EventType } from "./dispatch/EventContext";
export type { HandlerOptions, Registration } from "./dispatch/HandlerRegistry";
export { BaseDispatcher, type RunOptions } from "./dispatch/BaseDispatcher";
export { TaskDispatcher, type TaskDispatcherOptions } from "./dispatch/TaskDispatcher";
export { ChannelDispatcher } from "./dispatch/ChannelDispatcher";

export { RestClient, type ApplicationInfo, type GatewayInfo, type HttpMethod } from "./http/RestClient";
export { GatewayClient, openClient, type ClientOptions } from "./client/GatewayClient";
