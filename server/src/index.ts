import { loadSettings } from './config/settings.js'
import { createApp } from './app.js'

const settings = loadSettings()
const app = createApp({ settings })

app.listen(settings.port, () => {
  console.log(`Customer dashboard server listening on port ${settings.port}`)
})
