export type { RecipeOptions } from "./types.js";
export { columnsForBreakpoint, dealSections, responsiveLayout } from "./responsiveLayout.js";
export { type SidebarLayoutOptions, sidebarLayout } from "./sidebarLayout.js";
export {
  type DashboardGeometry,
  type DashboardOptions,
  dashboardGeometry,
  dashboardLayout,
} from "./dashboardLayout.js";
