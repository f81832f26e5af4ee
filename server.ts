import { main } from "./app";

main();
