import fs from 'fs/promises';
import path from 'path';
import { Router } from 'express';
import type multer from 'multer';
import { HttpError, errorMessage } from '@/utils/errors';
import { ensureDir, expandHome, isDirectory, removeFile } from '@/utils/files';
import { asyncHandler } from '@/utils/http';
import type { Logger } from '@/utils/logger';
import { formatTimestamp } from '@/utils/timestamps';
import { acceptSingleFile, formField } from '@/utils/uploads';
import { InvalidDocumentationError, type DocumentationGenerator } from '../docs/generator.service';
import { createMarkdownNotebook, serializeNotebook } from '../docs/notebook';
import { allowedFile, filePrefix, ipynbToText } from '../docs/templates';
import type { ModelRegistry } from '../settings/model.registry';
import type { PreferencesStore } from '../settings/preferences.store';

export const INVALID_RESPONSE =
  'Failed to generate documentation. The model did not return a valid response.';

interface GenerateRouterOptions {
  generator: Pick<DocumentationGenerator, 'generateWithSizeTiers'>;
  models: Pick<ModelRegistry, 'selectedModel' | 'workflowIdFor'>;
  preferences: Pick<PreferencesStore, 'load'>;
  upload: multer.Multer;
  uploadDir: string;
  outputDir: string;
  logger: Logger;
  now?: () => Date;
}

interface GenerateResponse {
  success: true;
  message: string;
  md_file: string;
  ipynb_file: string;
  timestamp: string;
  project_name: string;
}

export function createGenerateRouter(options: GenerateRouterOptions): Router {
  const { generator, models, preferences, upload, uploadDir, outputDir, logger } = options;
  const now = options.now ?? (() => new Date());
  const router = Router();

  router.post(
    '/generate',
    acceptSingleFile(upload, 'template_file'),
    asyncHandler(async (req, res) => {
      const timestamp = formatTimestamp(now());
      const folderInput = formField(req.body, 'folder_path');
      const projectName = formField(req.body, 'project_name');
      const template = req.file;
      const cleanup: string[] = [];
      let body: GenerateResponse;

      logger.info(
        { folderPath: folderInput, projectName: projectName ?? 'Not provided', template: template?.originalname },
        'Documentation generation request received'
      );

      try {
        if (!folderInput) {
          throw new HttpError(400, 'folder_path is required');
        }
        const folderPath = expandHome(folderInput);
        if (!(await isDirectory(folderPath))) {
          throw new HttpError(400, `Invalid project folder: ${folderPath}`);
        }
        if (!template || !allowedFile(template.originalname)) {
          throw new HttpError(400, 'Invalid template file');
        }

        let templatePath = path.join(uploadDir, `autodoc_${timestamp}_${path.basename(template.originalname)}`);
        await ensureDir(uploadDir);
        await fs.writeFile(templatePath, template.buffer);
        cleanup.push(templatePath);

        if (templatePath.toLowerCase().endsWith('.ipynb')) {
          templatePath = await ipynbToText(templatePath);
          cleanup.push(templatePath);
          logger.debug({ templatePath }, 'Converted notebook template to text');
        }
        const templateText = await fs.readFile(templatePath, 'utf8');

        const model = await models.selectedModel();
        const workflowId = models.workflowIdFor(model);
        if (!workflowId) {
          throw new Error(`No workflow configured for model: ${model}`);
        }
        const prefs = await preferences.load();
        logger.info({ model, workflowId, templateLength: templateText.length }, 'Starting documentation generation');

        const documentation = await generator.generateWithSizeTiers({
          folderPath,
          templateText,
          projectName,
          preferences: prefs,
          workflowId
        });
        const targetDir = path.join(outputDir, timestamp);
        await ensureDir(targetDir);
        const prefix = filePrefix(projectName);
        const mdFile = `${prefix}_${timestamp}.md`;
        const ipynbFile = `${prefix}_${timestamp}.ipynb`;
        await fs.writeFile(path.join(targetDir, mdFile), documentation, 'utf8');
        await fs.writeFile(
          path.join(targetDir, ipynbFile),
          serializeNotebook(createMarkdownNotebook(documentation)),
          'utf8'
        );
        logger.info({ targetDir, mdFile, ipynbFile }, 'Documentation written');

        body = {
          success: true,
          message: 'Documentation generated successfully',
          md_file: `/download/${timestamp}/${mdFile}`,
          ipynb_file: `/download/${timestamp}/${ipynbFile}`,
          timestamp,
          project_name: projectName ?? 'Not specified'
        };
      } catch (err) {
        if (err instanceof HttpError) throw err;
        if (err instanceof InvalidDocumentationError) {
          logger.warn('Model returned an invalid response');
          throw new HttpError(500, INVALID_RESPONSE);
        }
        logger.error({ err }, 'Error generating documentation');
        throw new HttpError(500, `Error generating documentation: ${errorMessage(err)}`);
      } finally {
        for (const file of cleanup) {
          await removeFile(file, logger);
        }
      }

      res.json(body);
    })
  );

  return router;
}
