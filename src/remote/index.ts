export { defineRemoteType, collectMethodNames, type RemoteClass, type RemoteType, type RemoteTypeOptions } from './remote-type.js';
export {
  createHandle,
  isHandleMember,
  HANDLE_MEMBERS,
  type HandleCore,
  type HandleMemberName,
  type HandleSummary,
  type HandleTypeInfo,
  type RemoteHandle,
  type RemoteMembers,
} from './handle.js';
export { spawn, type SpawnOptions } from './spawn.js';
