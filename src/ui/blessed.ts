import blessedModule from "blessed";

// The widget factories the dashboard draws with.
export const blessed = {
  screen: blessedModule.screen,
  box: blessedModule.box,
  list: blessedModule.list,
};
