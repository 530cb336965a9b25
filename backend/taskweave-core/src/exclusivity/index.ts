export { ExclusivityController, sharedExclusivityController } from "./ExclusivityController";
