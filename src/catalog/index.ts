export { ResourceCatalog, ResourceSelection, loadCatalog, licensedSubset } from "./catalog.js";
