// neo-blessed ships no typings; it keeps blessed's API.
declare module "neo-blessed" {
  import * as blessed from "blessed";
  export = blessed;
}
