/**
 * Builds a throwaway Dream root on disk for tests.
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

export const PIPELINE_JSON = JSON.stringify(
    {
        connectors: {
            sentseg: { protocol: 'http', timeout: 1.5, url: 'http://sentseg:8011/sentseg' },
            ner: { protocol: 'http', url: 'http://ner:8021/ner' },
            greeting: { protocol: 'python', class_name: 'PredefinedTextConnector' },
        },
        services: {
            last_chance_service: {
                connector: { protocol: 'python', class_name: 'PredefinedTextConnector', response_text: 'Sorry' },
                state_manager_method: 'add_bot_utterance_last_chance',
                tags: ['last_chance'],
            },
            timeout_service: {
                connector: { protocol: 'python', class_name: 'PredefinedTextConnector', response_text: 'Hmm' },
                state_manager_method: 'add_bot_utterance_last_chance',
                tags: ['timeout'],
            },
            annotators: {
                sentseg: {
                    connector: { protocol: 'http', timeout: 1.5, url: 'http://sentseg:8011/sentseg' },
                    dialog_formatter: 'state_formatters.dp_formatters:preproc_last_human_utterance_dialog',
                    state_manager_method: 'add_annotation',
                },
                ner: { connector: 'connectors.ner', state_manager_method: 'add_annotation' },
            },
            skill_selectors: {
                rule_based_selector: {
                    connector: { protocol: 'python', class_name: 'RuleBasedSkillSelectorConnector' },
                    state_manager_method: 'add_hypothesis',
                },
            },
            skills: {
                dff_program_y_skill: {
                    connector: { protocol: 'http', url: 'http://dff-program-y-skill:8008/respond' },
                    state_manager_method: 'add_hypothesis',
                },
                dummy_skill: {
                    connector: { protocol: 'python', class_name: 'DummySkillConnector' },
                    state_manager_method: 'add_hypothesis',
                },
            },
            response_selectors: {
                response_selector: {
                    connector: { protocol: 'http', url: 'http://convers-evaluation-selector:8009/respond' },
                    state_manager_method: 'add_bot_utterance',
                },
            },
        },
    },
    null,
    4,
);

export const OVERRIDE_YML = `services:
  agent:
    command: sh -c 'bin/wait && python -m deeppavlov_agent.run'
    environment:
      WAIT_HOSTS: "sentseg:8011, dff-program-y-skill:8008"
      WAIT_HOSTS_TIMEOUT: 480
  sentseg:
    env_file: [.env]
    build:
      context: ./annotators/SentSeg/
    command: flask run -h 0.0.0.0 -p 8011
    deploy:
      resources:
        limits:
          memory: 1.5G
version: '3.7'
`;

export const DEV_YML = `services:
  agent:
    volumes:
      - ".:/dp-agent"
    ports:
      - "4242:4242"
  mongo:
    ports:
      - "27017:27017"
  sentseg:
    volumes:
      - "./annotators/SentSeg:/src"
    ports:
      - "8011:8011"
  dff-program-y-skill:
    volumes:
      - "./skills/dff_program_y_skill:/src"
    ports:
      - "8008:8008"
version: "3.7"
`;

export const PROXY_YML = `services:
  sentseg:
    command: ["nginx", "-g", "daemon off;"]
    build:
      context: dp/proxy/
      dockerfile: Dockerfile
    environment:
      - PROXY_PASS=dream.deeppavlov.ai:8011
      - PORT=8011
  dff-program-y-skill:
    command: ["nginx", "-g", "daemon off;"]
    build:
      context: dp/proxy/
      dockerfile: Dockerfile
    environment:
      - PROXY_PASS=dream.deeppavlov.ai:8008
      - PORT=8008
    ports:
      - "8008:8008"
version: "3.7"
`;

export const LOCAL_YML = `services:
  agent:
    deploy:
      mode: replicated
      replicas: 1
version: "3.7"
`;

/** Default file name → content of the `dream` distribution. */
export const DREAM_DIST_FILES: Record<string, string> = {
    'pipeline_conf.json': PIPELINE_JSON,
    'docker-compose.override.yml': OVERRIDE_YML,
    'dev.yml': DEV_YML,
    'proxy.yml': PROXY_YML,
    'local.yml': LOCAL_YML,
};

/** Create an empty directory under the OS temp dir. */
export function makeTempDir(prefix: string = 'dreamtools-test-'): string {
    return mkdtempSync(join(tmpdir(), prefix));
}

/** Write a distribution's files and return its path. */
export function writeDist(dreamRoot: string, name: string, files: Record<string, string>): string {
    const distPath = join(dreamRoot, 'assistant_dists', name);
    mkdirSync(distPath, { recursive: true });
    for (const [fileName, content] of Object.entries(files)) {
        writeFileSync(join(distPath, fileName), content, 'utf-8');
    }
    return distPath;
}

/** Create a Dream root holding the `dream` distribution. */
export function createDreamRoot(): string {
    const root = makeTempDir();
    for (const subdir of ['assistant_dists', 'annotators', 'skills']) {
        mkdirSync(join(root, subdir), { recursive: true });
    }
    writeDist(root, 'dream', DREAM_DIST_FILES);
    return root;
}

export function removeDir(dir: string): void {
    rmSync(dir, { recursive: true, force: true });
}
