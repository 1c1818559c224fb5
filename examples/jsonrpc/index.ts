import { createComposer, serialize, wrapJsonRpcRequest } from "../../src/index.js";

const res = createComposer().compose(["minuend:42", "subtrahend:23"]);
if (!res.ok) throw new Error(res.error.message);

const request = wrapJsonRpcRequest(res.document, { method: "subtract", id: "1" });
if (!request.ok) throw new Error(request.error.message);

// {"id":1,"jsonrpc":"2.0","method":"subtract","params":{"minuend":42,"subtrahend":23}}
console.log(serialize(request.value));

const notification = wrapJsonRpcRequest(undefined, { method: "heartbeat" });
if (notification.ok) console.log(serialize(notification.value));
