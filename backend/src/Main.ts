import "./util/Env";
import { createAndStartServer } from "./AppFactory";

await createAndStartServer();
