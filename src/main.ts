import http from 'http';
import { loadConfig } from './config';
import { tileCode } from './domain/Tile';
import { RulesEngine } from './rules/RulesEngine';
import { createApp } from './server';

const config = loadConfig();
const engine = new RulesEngine(config);
const server = http.createServer(createApp(engine));

server.listen(config.port, () => {
  console.log(`[mahjong-rules] listening on http://localhost:${config.port} (round wind ${tileCode(config.roundWind)})`);
});
