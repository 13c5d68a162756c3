export { RoomHub } from "./room-hub";
