// @WebSocket("message", "typing")
export function HandleChat(): void {}
