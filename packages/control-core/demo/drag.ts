import { createDispatcher } from "../src";

const dispatcher = createDispatcher({
  perform: (action) => console.log("inject", action),
});

dispatcher.dispatch([
  { type: "CURSOR_MOVE", x: 0.4, y: 0.5 },
  { type: "DRAG_START" },
  { type: "DRAG_MOVE", x: 0.3, y: 0.45 },
  { type: "DRAG_END" },
]);

console.log("Mapper state after drag:", dispatcher.mapper.getState());
