import os from "os"
import path from "path"
import { xdgData } from "xdg-basedir"

const app = "news-reaction"

const data = path.join(xdgData ?? path.join(os.homedir(), ".local", "share"), app)

export namespace Global {
  export const App = {
    name: app,
    configFile: `${app}.json`,
  }

  export const Path = {
    data,
  }
}
