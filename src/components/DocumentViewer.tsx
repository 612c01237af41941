import React, { useEffect, useState } from 'react';
import { Alert, Box, Button, CircularProgress, Divider, Paper, Typography } from '@mui/material';
import { Download, OpenInNew } from '@mui/icons-material';
import type { PdfDocument } from '../types';

export interface DocumentFailure {
  message: string;
  // a non-200 answer is a warning, anything else an error
  status: number | null;
}

interface DocumentViewerProps {
  year: number;
  make: string;
  name: string;
  url: string | null;
  document: PdfDocument | null;
  loading: boolean;
  failure: DocumentFailure | null;
  height: number;
}

const usePdfObjectUrl = (document: PdfDocument | null): string | null => {
  const [objectUrl, setObjectUrl] = useState<string | null>(null);

  useEffect(() => {
    if (!document) {
      setObjectUrl(null);
      return undefined;
    }
    const url = URL.createObjectURL(new Blob([document.bytes], { type: 'application/pdf' }));
    setObjectUrl(url);
    return () => URL.revokeObjectURL(url);
  }, [document]);

  return objectUrl;
};

const DocumentViewer: React.FC<DocumentViewerProps> = ({
  year,
  make,
  name,
  url,
  document,
  loading,
  failure,
  height,
}) => {
  const objectUrl = usePdfObjectUrl(document);

  return (
    <Paper elevation={1} sx={{ p: 3 }}>
      <Typography variant="h6" sx={{ fontWeight: 600, mb: 2 }}>
        Showing documentation for {year} {make} - {name}
      </Typography>

      <Typography variant="subtitle2" color="text.secondary" gutterBottom>
        DOCUMENT ACTIONS
      </Typography>
      <Box sx={{ display: 'flex', gap: 1, flexWrap: 'wrap', mb: 2 }}>
        {url && (
          <Button
            variant="contained"
            color="primary"
            href={url}
            target="_blank"
            rel="noopener noreferrer"
            startIcon={<OpenInNew />}
          >
            Open PDF in New Tab
          </Button>
        )}
        {document && objectUrl && (
          <Button
            variant="outlined"
            component="a"
            href={objectUrl}
            download={document.filename}
            startIcon={<Download />}
          >
            Download PDF
          </Button>
        )}
      </Box>

      <Divider sx={{ my: 2 }} />

      {loading ? (
        <Box sx={{ display: 'flex', alignItems: 'center', gap: 2, py: 2 }}>
          <CircularProgress size={20} />
          <Typography variant="body2" color="text.secondary">
            Downloading PDF...
          </Typography>
        </Box>
      ) : failure ? (
        <>
          <Alert severity={failure.status === null ? 'error' : 'warning'} sx={{ mb: 2 }}>
            {failure.message}
          </Alert>
          {url && (
            <Alert severity="info">
              Please use the 'Open PDF in New Tab' link above to view the documentation.
            </Alert>
          )}
        </>
      ) : objectUrl ? (
        <iframe
          src={objectUrl}
          title={`${make} ${name}`}
          style={{
            width: '100%',
            height,
            border: 'none',
            boxShadow: '0 4px 8px rgba(0,0,0,0.1)',
          }}
        />
      ) : (
        <Alert severity="error">Could not load PDF. Please try opening in a new tab.</Alert>
      )}
    </Paper>
  );
};

export default DocumentViewer;
